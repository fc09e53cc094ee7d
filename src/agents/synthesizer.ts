/**
 * Answer synthesizer: turns gathered context into the final answer for the
 * document-search and web-search branches.
 *
 * Dependency direction: synthesizer.ts → agents/base
 * Used by: orchestrator
 */

import { BaseAgent, type AgentOptions, type AgentOutput } from './base.js';
import type { StreamCallbacks } from './types.js';
import type { LLMProvider } from '../providers/types.js';

export interface SynthesisInput {
    question: string;
    context: string;
}

export class AnswerSynthesizer extends BaseAgent<SynthesisInput> {
    constructor(provider: LLMProvider, options: AgentOptions) {
        super('synthesizer', provider, options);
    }

    /**
     * Answer the question from the context and return the text verbatim.
     *
     * @throws {ProviderError} if the model call fails
     */
    async synthesize(question: string, context: string): Promise<string> {
        return (await this.answer(question, context)).content;
    }

    /** Same as synthesize(), keeping token usage and optionally streaming. */
    async answer(question: string, context: string, callbacks?: StreamCallbacks): Promise<AgentOutput> {
        return this.execute({ question, context }, callbacks);
    }

    protected buildUserPrompt(input: SynthesisInput): string {
        return [
            'CONTEXT:',
            input.context,
            '',
            'QUESTION:',
            input.question,
            '',
            'If the context does not contain the answer, say that you could not find it in the available material.',
            '',
            'ANSWER:',
        ].join('\n');
    }
}
