/**
 * Branch and model-role definitions.
 *
 * A question is routed to exactly one branch. Two branches gather context and
 * hand it to the synthesizer; the other six generate the final answer themselves.
 *
 * Dependency direction: agents/types.ts → nothing (leaf module)
 * Used by: router, generators, workflow engine, orchestrator, config schema
 */

/** All tools a question can be routed to. */
export type Branch =
    | 'document-search'
    | 'web-search'
    | 'long-form-answer'
    | 'study-plan'
    | 'quiz'
    | 'flashcards'
    | 'explain-concept'
    | 'important-questions';

/** Branches that produce their own answer and skip synthesis. */
export type GeneratorBranch = Exclude<Branch, 'document-search' | 'web-search'>;

/** Branches that only gather context for the synthesizer. */
export type ContextBranch = Extract<Branch, 'document-search' | 'web-search'>;

/** Every model-backed step; used for prompt files, config and token accounting. */
export type ModelRole = 'router' | 'synthesizer' | GeneratorBranch;

/** All branches in routing-prompt order. */
export const ALL_BRANCHES: readonly Branch[] = [
    'document-search',
    'web-search',
    'long-form-answer',
    'study-plan',
    'quiz',
    'flashcards',
    'explain-concept',
    'important-questions',
] as const;

export const GENERATOR_BRANCHES: readonly GeneratorBranch[] = [
    'long-form-answer',
    'study-plan',
    'quiz',
    'flashcards',
    'explain-concept',
    'important-questions',
] as const;

export const ALL_MODEL_ROLES: readonly ModelRole[] = ['router', 'synthesizer', ...GENERATOR_BRANCHES];

/** Display-friendly labels for each branch. */
export const BRANCH_LABELS: Record<Branch, string> = {
    'document-search': '📚 Document Search',
    'web-search': '🌐 Web Search',
    'long-form-answer': '📝 16-Mark Answer',
    'study-plan': '📅 Study Plan',
    quiz: '❓ Quiz',
    flashcards: '🗂️ Flashcards',
    'explain-concept': '💡 Concept Explanation',
    'important-questions': '⭐ Important Questions',
};

export const MODEL_ROLE_LABELS: Record<ModelRole, string> = {
    router: '🧭 Router',
    synthesizer: '🧠 Synthesizer',
    'long-form-answer': BRANCH_LABELS['long-form-answer'],
    'study-plan': BRANCH_LABELS['study-plan'],
    quiz: BRANCH_LABELS.quiz,
    flashcards: BRANCH_LABELS.flashcards,
    'explain-concept': BRANCH_LABELS['explain-concept'],
    'important-questions': BRANCH_LABELS['important-questions'],
};

export function isBranch(value: string): value is Branch {
    return ALL_BRANCHES.some((branch) => branch === value);
}

export function isGeneratorBranch(branch: Branch): branch is GeneratorBranch {
    return branch !== 'document-search' && branch !== 'web-search';
}

/** Callbacks for streaming model output. */
export interface StreamCallbacks {
    /** Called for each text chunk as it arrives. */
    onChunk?: (text: string) => void;
    /** Called once when the full response is complete. */
    onComplete?: (fullText: string) => void;
}
