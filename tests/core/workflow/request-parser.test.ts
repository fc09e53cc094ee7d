import { describe, it, expect } from 'vitest';
import {
    extractTopic,
    extractCount,
    extractDifficulty,
    extractStudyPlanRequest,
    parseTaskRequest,
    GENERIC_QUESTIONS_TOPIC,
} from '../../../src/core/workflow/request-parser.js';

describe('extractTopic', () => {
    it.each([
        ['Give me a quiz on photosynthesis', 'quiz', 'photosynthesis'],
        ['Create a quiz with 10 hard questions on photosynthesis', 'quiz', 'photosynthesis'],
        ['Create flashcards on Data Structures', 'flashcards', 'Data Structures'],
        ['Explain binary search', 'explain-concept', 'binary search'],
        ['Explain the concept of recursion in detail', 'explain-concept', 'recursion'],
    ] as const)('"%s" (%s) → %s', (question, branch, topic) => {
        expect(extractTopic(question, branch)).toBe(topic);
    });

    it('uses a generic topic when important questions name none', () => {
        expect(extractTopic('List the 10 most important questions from my notes', 'important-questions')).toBe(
            GENERIC_QUESTIONS_TOPIC,
        );
    });

    it('falls back to the whole question when nothing is left', () => {
        expect(extractTopic('  quiz me  ', 'quiz')).toBe('quiz me');
    });

    it('keeps numbers and difficulty words that belong to the topic', () => {
        expect(extractTopic('Create 10 flashcards on World War 2 history', 'flashcards')).toBe('World War 2 history');
        expect(extractTopic('Give me 5 important questions on World War 2', 'important-questions')).toBe('World War 2');
        expect(extractTopic('Create a quiz on Hard disk scheduling', 'quiz')).toBe('Hard disk scheduling');
        expect(extractTopic('Quiz me on hypothesis tests', 'quiz')).toBe('hypothesis tests');
    });

    it('drops a difficulty phrase from an explanation request', () => {
        expect(extractTopic('Explain recursion in easy terms', 'explain-concept')).toBe('recursion');
    });

    it('does not strip filler from the start of a real word', () => {
        expect(extractTopic('Explain theory of computation', 'explain-concept')).toBe('theory of computation');
    });
});

describe('extractCount', () => {
    it('reads the number before a noun', () => {
        expect(extractCount('Create 12 flashcards on cells', ['flashcard', 'flash card', 'card'])).toBe(12);
        expect(extractCount('Make 5 flash cards about cells', ['flashcard', 'flash card', 'card'])).toBe(5);
    });

    it('allows a difficulty word in between', () => {
        expect(extractCount('Create a quiz with 10 hard questions', ['question', 'mcq'])).toBe(10);
    });

    it('returns undefined without a count', () => {
        expect(extractCount('Create a quiz on cells', ['question', 'mcq'])).toBeUndefined();
        expect(extractCount('Create 3 quizzes', [])).toBeUndefined();
    });
});

describe('extractDifficulty', () => {
    it('finds a difficulty word in any case', () => {
        expect(extractDifficulty('Give me an EASY quiz')).toBe('easy');
    });

    it('returns undefined when none is given', () => {
        expect(extractDifficulty('Give me a quiz')).toBeUndefined();
    });

    it('reads a difficulty only where it qualifies the task', () => {
        expect(extractDifficulty('Create a quiz with 10 hard questions')).toBe('hard');
        expect(extractDifficulty('Explain recursion in easy terms')).toBe('easy');
        expect(extractDifficulty('Quiz on sorting, difficulty: medium')).toBe('medium');
        expect(extractDifficulty('Create a quiz on Hard disk scheduling')).toBeUndefined();
    });
});

describe('extractStudyPlanRequest', () => {
    it('reads topics and hours per day', () => {
        expect(
            extractStudyPlanRequest('Create a study plan for Graphs, Trees, 4 hours per day', { hoursPerDay: 3 }),
        ).toEqual({ topics: ['Graphs', 'Trees'], hoursPerDay: 4 });
    });

    it('reads an ISO exam date and stops the topic list before it', () => {
        expect(
            extractStudyPlanRequest('Make a study plan for Graphs and Trees before 2026-11-18', { hoursPerDay: 3 }),
        ).toEqual({ topics: ['Graphs', 'Trees'], examDate: '2026-11-18', hoursPerDay: 3 });
    });

    it('treats "my exam" as the occasion, not a topic', () => {
        expect(extractStudyPlanRequest('Create a study plan for my exam on 2026-12-01', { hoursPerDay: 3 })).toEqual({
            topics: ['General Topics'],
            examDate: '2026-12-01',
            hoursPerDay: 3,
        });
        expect(
            extractStudyPlanRequest('Create a study plan for my exam on Graphs and Trees', { hoursPerDay: 3 }).topics,
        ).toEqual(['Graphs', 'Trees']);
    });

    it('keeps "in" inside a topic and stops at a time span', () => {
        expect(
            extractStudyPlanRequest('Create a study plan for Data Structures in C and Graph Theory', { hoursPerDay: 3 })
                .topics,
        ).toEqual(['Data Structures in C', 'Graph Theory']);
        expect(extractStudyPlanRequest('Make a study plan for Graphs in 10 days', { hoursPerDay: 3 }).topics).toEqual([
            'Graphs',
        ]);
    });

    it('uses the default exam date and topics when the text has none', () => {
        expect(extractStudyPlanRequest('Create a study plan', { examDate: '2026-12-01', hoursPerDay: 2 })).toEqual({
            topics: ['General Topics'],
            examDate: '2026-12-01',
            hoursPerDay: 2,
        });
    });
});

describe('parseTaskRequest', () => {
    it('collects the parameters each generator needs', () => {
        expect(parseTaskRequest('quiz', 'Create a quiz with 10 hard questions on photosynthesis', { hoursPerDay: 3 })).toEqual({
            branch: 'quiz',
            topic: 'photosynthesis',
            numQuestions: 10,
            difficulty: 'hard',
        });
        expect(parseTaskRequest('flashcards', 'Create flashcards on cells', { hoursPerDay: 3 })).toEqual({
            branch: 'flashcards',
            topic: 'cells',
            numCards: undefined,
        });
        expect(parseTaskRequest('long-form-answer', 'Write a 16 mark answer on deadlocks', { hoursPerDay: 3 })).toEqual({
            branch: 'long-form-answer',
            question: 'Write a 16 mark answer on deadlocks',
        });
    });

    it('takes the exam date from the defaults when the text has none', () => {
        expect(
            parseTaskRequest('study-plan', 'Create a study plan for Graphs', { examDate: '2026-12-01', hoursPerDay: 2 }),
        ).toEqual({ branch: 'study-plan', topics: ['Graphs'], examDate: '2026-12-01', hoursPerDay: 2 });
    });
});
