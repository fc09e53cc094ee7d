/**
 * Request parsing: pulls the topic and task parameters out of a question.
 *
 * Deterministic text rules only; no model call.
 *
 * Dependency direction: request-parser.ts → agents/types, utils/validation
 * Used by: orchestrator
 */

import type { Branch, GeneratorBranch } from '../../agents/types.js';
import { difficultySchema, type Difficulty } from '../../utils/validation.js';

export const GENERIC_QUESTIONS_TOPIC = 'the topics covered in the study materials';
export const DEFAULT_PLAN_TOPICS: readonly string[] = ['General Topics'];

const LEADING_REQUEST =
    /^(?:please\s+)?(?:(?:can|could|would)\s+you\s+)?(?:please\s+)?(?:create|make|generate|give\s+me|write|prepare|build|produce|list|explain|describe|define|what\s+(?:is|are)|what's|tell\s+me\s+about|help\s+me\s+(?:understand|with)|i\s+(?:want|need)|show\s+me)\b\s*/i;

// A difficulty word only counts when it qualifies the task, so "Hard disk
// scheduling" keeps its first word.
const DIFFICULTY_PHRASES: readonly RegExp[] = [
    /\b(easy|medium|hard)\s+(?:(?:quiz(?:zes)?|questions?|mcqs?|flash\s?cards?|cards?|terms|explanation|version|level|difficulty|mode)\b)/i,
    /\b(?:difficulty|level)\s*(?::|=|of|is)?\s*(easy|medium|hard)\b/i,
    /\b(?:make|keep)\s+it\s+(easy|medium|hard)\b/i,
];

const DIFFICULTY_QUALIFIERS: readonly RegExp[] = [
    /\b(?:easy|medium|hard)\s+(?=(?:quiz(?:zes)?|questions?|mcqs?)\b)/gi,
    /\b(?:in\s+)?(?:an?\s+)?(?:easy|medium|hard)\s+(?:terms|explanation|version|level|difficulty|mode)\b/gi,
    /\b(?:difficulty|level)\s*(?::|=|of|is)?\s*(?:easy|medium|hard)\b/gi,
    /\b(?:make|keep)\s+it\s+(?:easy|medium|hard)\b/gi,
];

const BRANCH_NOUNS: Record<Branch, readonly RegExp[]> = {
    'document-search': [],
    'web-search': [],
    'long-form-answer': [/\b16[-\s]?marks?(?:\s+answers?)?\b/gi, /\bexam\s+answers?\b/gi, /\banswers?\b/gi],
    'study-plan': [/\bstudy\s+(?:plan|schedule)s?\b/gi],
    quiz: [
        /\b\d+\s+(?:(?:easy|medium|hard)\s+)?(?:questions?|mcqs?)\b/gi,
        ...DIFFICULTY_QUALIFIERS,
        /\bquiz(?:zes)?(?:\s+me)?\b/gi,
        /\btest\s+me\b/gi,
        /\b(?:a|practice|mock)\s+tests?\b/gi,
        /\bpractice\s+questions?\b/gi,
    ],
    flashcards: [/\b\d+\s+(?=flash\s?cards?\b|cards?\b)/gi, /\bflash\s?cards?\b/gi, /\bdeck\b/gi],
    'explain-concept': [/\bthe\s+concept\s+of\b/gi, /\bin\s+detail\b/gi, ...DIFFICULTY_QUALIFIERS],
    'important-questions': [
        /\b\d+\s+(?=(?:most\s+)?important\b|(?:exam\s+)?questions?\b)/gi,
        /\b(?:most\s+)?important\s+(?:exam\s+)?questions?\b/gi,
        /\bfrom\s+(?:my|the)\s+(?:study\s+)?(?:materials?|notes|documents?)\b/gi,
    ],
};

const LEADING_FILLER = /^(?:(?:a|an|the|some|on|about|for|of|to|regarding|covering|me|with)(?:\s+|$))+/i;
const TRAILING_PUNCTUATION = /[\s?.!:,;]+$/;

function tidy(text: string): string {
    return text.replace(/\s{2,}/g, ' ').trim().replace(LEADING_FILLER, '').replace(TRAILING_PUNCTUATION, '').trim();
}

/**
 * Extract the subject of a request, e.g. "Create flashcards on Data Structures"
 * → "Data Structures".
 *
 * Falls back to the trimmed question when too little is left, or to a
 * generic topic for important-questions.
 */
export function extractTopic(question: string, branch: Branch): string {
    let topic = question.trim().replace(LEADING_REQUEST, '');

    for (const pattern of BRANCH_NOUNS[branch]) {
        topic = topic.replace(pattern, ' ');
    }
    topic = tidy(topic);

    if (topic.length >= 3) return topic;
    return branch === 'important-questions' ? GENERIC_QUESTIONS_TOPIC : question.trim();
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * The first integer directly before one of the nouns ("10 flashcards",
 * "5 hard questions"). Plurals and a difficulty word in between are allowed.
 */
export function extractCount(question: string, nouns: readonly string[]): number | undefined {
    if (nouns.length === 0) return undefined;

    const alternatives = nouns.map((n) => escapeRegExp(n).replace(/\s+/g, '\\s?')).join('|');
    const pattern = new RegExp(`\\b(\\d{1,4})\\s+(?:(?:easy|medium|hard)\\s+)?(?:${alternatives})s?\\b`, 'i');
    const match = pattern.exec(question);

    return match?.[1] !== undefined ? Number(match[1]) : undefined;
}

/** A difficulty word that qualifies the task ("5 hard questions", "an easy quiz", "difficulty: medium"). */
export function extractDifficulty(question: string): Difficulty | undefined {
    for (const pattern of DIFFICULTY_PHRASES) {
        const word = pattern.exec(question)?.[1];
        if (word === undefined) continue;

        const parsed = difficultySchema.safeParse(word.toLowerCase());
        if (parsed.success) return parsed.data;
    }
    return undefined;
}

export interface StudyPlanRequest {
    topics: string[];
    examDate?: string;
    hoursPerDay: number;
}

const ISO_DATE = /\b(\d{4}-\d{2}-\d{2})\b/;
const HOURS_PER_DAY = /\b(\d+(?:\.\d+)?)\s*(?:hours?|hrs?)\s*(?:(?:a|per|each|every)\s+day|daily)\b/i;
const TOPICS_START = /\b(?:for|on|covering|about)\s+(.+)$/i;
const TOPICS_END =
    /(?:[\s,;]+(?:with|before|by|until|in\s+(?:\d+|a|one|two|three|four|the\s+next)\s+(?:days?|weeks?|months?)|and\s+(?:my|the)\s+exam|exam|my\s+exam|the\s+exam)\b|[.?!]).*$/i;
/** "my exam", "the final test": names the occasion, not a topic. */
const EXAM_REFERENCE = /^(?:my|our|your|the|an?)\s+(?:upcoming\s+|final\s+|next\s+)?(?:exams?|tests?|finals)\b/i;

function topicsSegment(text: string): string {
    let segment = TOPICS_START.exec(text)?.[1] ?? '';
    if (EXAM_REFERENCE.test(segment)) {
        segment = TOPICS_START.exec(segment.replace(EXAM_REFERENCE, ''))?.[1] ?? '';
    }
    return segment.replace(TOPICS_END, '');
}

/**
 * Pull study-plan parameters from free text.
 *
 * The exam date is the first ISO date in the text, else the default (usually
 * the session's exam date). Hours come from "N hours a/per day". Topics are
 * the comma/"and"-separated list after for/on/covering/about.
 */
export function extractStudyPlanRequest(
    question: string,
    defaults: { examDate?: string; hoursPerDay: number },
): StudyPlanRequest {
    const examDate = ISO_DATE.exec(question)?.[1] ?? defaults.examDate;

    const hoursMatch = HOURS_PER_DAY.exec(question);
    const hoursPerDay = hoursMatch?.[1] !== undefined ? Number(hoursMatch[1]) : defaults.hoursPerDay;

    const stripped = question.replace(ISO_DATE, ' ').replace(HOURS_PER_DAY, ' ');
    const segment = topicsSegment(stripped);

    const topics = segment
        .split(/,|&|\band\b/i)
        .map(tidy)
        .filter((t) => t.length > 0);

    return {
        topics: topics.length > 0 ? topics : [...DEFAULT_PLAN_TOPICS],
        ...(examDate !== undefined ? { examDate } : {}),
        hoursPerDay,
    };
}

/**
 * A generator branch with the parameters it runs with. Unset fields take the
 * configured study defaults.
 */
export type TaskRequest =
    | { branch: 'long-form-answer'; question: string }
    | { branch: 'study-plan'; topics: string[]; examDate?: string; hoursPerDay?: number }
    | { branch: 'quiz'; topic: string; numQuestions?: number; difficulty?: Difficulty }
    | { branch: 'flashcards'; topic: string; numCards?: number }
    | { branch: 'explain-concept'; topic: string; difficulty?: Difficulty }
    | { branch: 'important-questions'; topic: string; numQuestions?: number };

/** Read a routed question's task parameters from its text. */
export function parseTaskRequest(
    branch: GeneratorBranch,
    question: string,
    defaults: { examDate?: string; hoursPerDay: number },
): TaskRequest {
    switch (branch) {
        case 'long-form-answer':
            return { branch, question };
        case 'study-plan':
            return { branch, ...extractStudyPlanRequest(question, defaults) };
        case 'quiz':
            return {
                branch,
                topic: extractTopic(question, branch),
                numQuestions: extractCount(question, ['question', 'mcq']),
                difficulty: extractDifficulty(question),
            };
        case 'flashcards':
            return {
                branch,
                topic: extractTopic(question, branch),
                numCards: extractCount(question, ['flashcard', 'flash card', 'card']),
            };
        case 'explain-concept':
            return { branch, topic: extractTopic(question, branch), difficulty: extractDifficulty(question) };
        case 'important-questions':
            return {
                branch,
                topic: extractTopic(question, branch),
                numQuestions: extractCount(question, ['important question', 'question']),
            };
    }
}
