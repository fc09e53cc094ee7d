/**
 * Router: classifies a question into exactly one branch.
 *
 * Explicit cue phrases decide without a model call. Otherwise the model is
 * asked for a tool name and its free-text reply is scanned for a known
 * keyword; an unrecognisable reply falls back to document search.
 *
 * Dependency direction: router.ts → agents/base, agents/types
 * Used by: orchestrator
 */

import { BaseAgent, type AgentOptions } from './base.js';
import type { Branch } from './types.js';
import type { LLMProvider } from '../providers/types.js';
import { logger } from '../utils/logger.js';

/** `requested` means the caller named the branch and no routing took place. */
export type RoutingReason = 'cue' | 'model' | 'fallback' | 'requested';

export interface RoutingDecision {
    branch: Branch;
    reason: RoutingReason;
    /** The model's raw reply, absent for cue decisions. */
    rawResponse?: string;
    tokensUsed: number;
}

interface CueRule {
    branch: Branch;
    pattern: RegExp;
}

/** Checked in order; the first match wins. */
const CUE_RULES: readonly CueRule[] = [
    { branch: 'long-form-answer', pattern: /\b16[-\s]?marks?\b|\bexam answers?\b/i },
    { branch: 'quiz', pattern: /\bquiz|\btests?\b|\bpractice questions?\b/i },
    { branch: 'flashcards', pattern: /\bflash\s?cards?\b/i },
    { branch: 'important-questions', pattern: /\bimportant questions?\b/i },
    { branch: 'study-plan', pattern: /\bstudy (?:plan|schedule)s?\b/i },
];

/** Keywords recognised in a normalised model reply. */
const RESPONSE_KEYWORDS: ReadonlyArray<readonly [string, Branch]> = [
    ['document-search', 'document-search'],
    ['web-search', 'web-search'],
    ['long-form-answer', 'long-form-answer'],
    ['study-plan', 'study-plan'],
    ['quiz', 'quiz'],
    ['flashcards', 'flashcards'],
    ['explain-concept', 'explain-concept'],
    ['important-questions', 'important-questions'],
    ['exam-answer', 'long-form-answer'],
    ['rag-tool', 'document-search'],
    ['vectorstore', 'document-search'],
    ['explain', 'explain-concept'],
    ['flashcard', 'flashcards'],
];

/** Return the branch named by an explicit cue phrase, if any. */
export function matchCue(question: string): Branch | undefined {
    return CUE_RULES.find((rule) => rule.pattern.test(question))?.branch;
}

/**
 * Map a model reply to a branch.
 *
 * The reply is lower-cased with `_` and whitespace turned into `-`; the
 * earliest keyword wins, and the longer keyword wins a tie.
 */
export function parseRoutingResponse(response: string): Branch | undefined {
    const normalised = response.toLowerCase().replace(/[_\s]+/g, '-');

    let best: { index: number; length: number; branch: Branch } | undefined;
    for (const [keyword, branch] of RESPONSE_KEYWORDS) {
        const index = normalised.indexOf(keyword);
        if (index === -1) continue;
        if (!best || index < best.index || (index === best.index && keyword.length > best.length)) {
            best = { index, length: keyword.length, branch };
        }
    }

    return best?.branch;
}

export class RouterAgent extends BaseAgent<string> {
    constructor(provider: LLMProvider, options: AgentOptions) {
        super('router', provider, options);
    }

    /**
     * Decide the branch for a question and say how it was decided.
     *
     * @throws {ProviderError} if the model call fails
     */
    async decide(question: string): Promise<RoutingDecision> {
        const cue = matchCue(question);
        if (cue) {
            logger.debug(`Routed by cue phrase: ${cue}`);
            return { branch: cue, reason: 'cue', tokensUsed: 0 };
        }

        const output = await this.execute(question);
        const branch = parseRoutingResponse(output.content);

        if (!branch) {
            logger.debug(`Unrecognised routing reply "${output.content.trim()}"; using document-search`);
            return {
                branch: 'document-search',
                reason: 'fallback',
                rawResponse: output.content,
                tokensUsed: output.tokensUsed,
            };
        }

        logger.debug(`Routed by model: ${branch}`);
        return { branch, reason: 'model', rawResponse: output.content, tokensUsed: output.tokensUsed };
    }

    async route(question: string): Promise<Branch> {
        return (await this.decide(question)).branch;
    }

    protected buildUserPrompt(question: string): string {
        return `USER QUESTION: "${question}"\n\nRespond with ONLY the tool name.`;
    }
}
