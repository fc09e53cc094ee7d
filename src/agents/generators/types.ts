/**
 * Result and metadata shapes shared by the six task generators.
 *
 * Dependency direction: generators/types.ts → utils/validation (types only)
 * Used by: generators, orchestrator, CLI renderers
 */

import type { Difficulty } from '../../utils/validation.js';

export interface LongFormAnswerMeta {
    kind: 'long-form-answer';
    question: string;
    marks: 16;
}

export interface StudyPlanMeta {
    kind: 'study-plan';
    topics: string[];
    /** The exam date used in the prompt, `YYYY-MM-DD`. */
    examDate: string;
    daysAvailable: number;
    hoursPerDay: number;
    /** True when the requested date was missing, malformed or not in the future. */
    examDateAdjusted: boolean;
    /** The date as requested, when one was given. */
    requestedExamDate?: string;
}

export interface QuizMeta {
    kind: 'quiz';
    topic: string;
    numQuestions: number;
    difficulty: Difficulty;
}

export interface FlashcardsMeta {
    kind: 'flashcards';
    topic: string;
    numCards: number;
}

export interface ExplainConceptMeta {
    kind: 'explain-concept';
    concept: string;
    difficulty: Difficulty;
}

export interface ImportantQuestionsMeta {
    kind: 'important-questions';
    topic: string;
    numQuestions: number;
}

/** Discriminated by `kind`, which is always the generator's branch. */
export type TaskMetadata =
    | LongFormAnswerMeta
    | StudyPlanMeta
    | QuizMeta
    | FlashcardsMeta
    | ExplainConceptMeta
    | ImportantQuestionsMeta;

export interface TaskResult<TMeta extends TaskMetadata = TaskMetadata> {
    /** Model output, passed through verbatim. */
    text: string;
    /** ISO-8601 timestamp. */
    generatedAt: string;
    tokensUsed: number;
    metadata: TMeta;
}
