/**
 * End-to-end question cycles with scripted models and in-memory context.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
    StudyBuddy,
    EMPTY_STORE_MESSAGE,
    EMPTY_WEB_MESSAGE,
    formatUserFacingError,
    joinChunks,
} from '../../../src/core/workflow/orchestrator.js';
import { StudySession } from '../../../src/core/workflow/session.js';
import { RouterAgent } from '../../../src/agents/router.js';
import { AnswerSynthesizer } from '../../../src/agents/synthesizer.js';
import {
    LongFormAnswerGenerator,
    StudyPlanGenerator,
    QuizGenerator,
    FlashcardsGenerator,
    ExplainConceptGenerator,
    ImportantQuestionsGenerator,
} from '../../../src/agents/generators/index.js';
import type { Agents } from '../../../src/agents/factory.js';
import type { ContextSource } from '../../../src/knowledge/context-provider.js';
import type { ContextChunk } from '../../../src/knowledge/types.js';
import type { CycleState } from '../../../src/core/workflow/engine.js';
import { WebLookupProvider } from '../../../src/web/web-lookup.js';
import { getDefaultConfig } from '../../../src/core/config/manager.js';
import { ProviderError, SearchError, ValidationError } from '../../../src/core/errors.js';
import { LogLevel, logger } from '../../../src/utils/logger.js';
import { ScriptedProvider, StubPageFetcher, StubSearchClient } from '../../helpers/fakes.js';

// Local noon on 19 October 2026.
const NOW = new Date(2026, 9, 19, 12);
const clock = () => NOW;

const BIO_CHUNKS: ContextChunk[] = [
    { text: 'Photosynthesis turns light into chemical energy.', sourceId: 'bio.pdf', similarityRank: 1 },
    { text: 'Chlorophyll absorbs red and blue light.', sourceId: 'bio.pdf', similarityRank: 2 },
];

class StubContextSource implements ContextSource {
    readonly queries: Array<{ query: string; k: number }> = [];

    constructor(private readonly chunks: ContextChunk[]) {}

    async retrieve(query: string, k: number): Promise<ContextChunk[]> {
        this.queries.push({ query, k });
        return this.chunks.slice(0, k);
    }
}

interface Harness {
    buddy: StudyBuddy;
    router: ScriptedProvider;
    synthesizer: ScriptedProvider;
    generator: ScriptedProvider;
    context: StubContextSource;
    search: StubSearchClient;
}

function harness(options: {
    route?: string;
    answer?: string | Error;
    chunks?: ContextChunk[];
    search?: StubSearchClient;
    fetcher?: StubPageFetcher;
}): Harness {
    const router = new ScriptedProvider(options.route ?? 'document_search');
    const synthesizer = new ScriptedProvider(options.answer ?? 'synthesized answer');
    const generator = new ScriptedProvider(options.answer ?? 'generated output');
    const genOptions = { model: 'gen-model', clock };

    const agents: Agents = {
        router: new RouterAgent(router, { model: 'router-model', temperature: 0 }),
        synthesizer: new AnswerSynthesizer(synthesizer, { model: 'synth-model' }),
        generators: {
            'long-form-answer': new LongFormAnswerGenerator(generator, genOptions),
            'study-plan': new StudyPlanGenerator(generator, genOptions),
            quiz: new QuizGenerator(generator, genOptions),
            flashcards: new FlashcardsGenerator(generator, genOptions),
            'explain-concept': new ExplainConceptGenerator(generator, genOptions),
            'important-questions': new ImportantQuestionsGenerator(generator, genOptions),
        },
    };

    const context = new StubContextSource(options.chunks ?? BIO_CHUNKS);
    const search = options.search ?? new StubSearchClient([]);
    const config = getDefaultConfig();

    const buddy = new StudyBuddy({
        agents,
        context,
        web: new WebLookupProvider(search, options.fetcher ?? new StubPageFetcher({})),
        retrieval: config.retrieval,
        search: { maxResults: 3, contextCharLimit: 10 },
        study: config.study,
        clock,
    });

    return { buddy, router, synthesizer, generator, context, search };
}

function states(history: ReadonlyArray<{ to: CycleState }>): CycleState[] {
    return history.map((h) => h.to);
}

beforeEach(() => {
    logger.setLogLevel(LogLevel.Silent);
});

afterEach(() => {
    logger.setLogLevel(LogLevel.Info);
});

describe('StudyBuddy document search', () => {
    it('retrieves context, synthesizes and records the exchange', async () => {
        const h = harness({ route: 'document_search', answer: 'It turns light into energy.' });
        const session = new StudySession({ id: 'session-doc', clock });

        const result = await h.buddy.query('What is photosynthesis?', { session });

        expect(result).toEqual({
            answerText: 'It turns light into energy.',
            toolUsed: 'document-search',
            contextUsed: BIO_CHUNKS,
            generatedAt: NOW.toISOString(),
            tokensUsed: 30,
            routingReason: 'model',
            history: result.history,
        });
        expect(states(result.history)).toEqual(['routing', 'document-search', 'synthesizing', 'terminal']);
        expect(h.context.queries).toEqual([{ query: 'What is photosynthesis?', k: 5 }]);
        expect(h.synthesizer.userPrompt()).toContain(`CONTEXT:\n${joinChunks(BIO_CHUNKS)}\n`);
        expect(session.messages.map((m) => [m.role, m.content, m.toolUsed])).toEqual([
            ['user', 'What is photosynthesis?', undefined],
            ['assistant', 'It turns light into energy.', 'document-search'],
        ]);
    });

    it('tells the synthesizer when the store is empty', async () => {
        const h = harness({ route: 'document_search', chunks: [] });

        const result = await h.buddy.query('What is photosynthesis?');

        expect(result.contextUsed).toEqual([]);
        expect(h.synthesizer.userPrompt()).toContain(`CONTEXT:\n${EMPTY_STORE_MESSAGE}\n`);
    });

    it('falls back to document search on an unrecognised route', async () => {
        const h = harness({ route: 'banana' });

        const result = await h.buddy.query('What is photosynthesis?');

        expect(result.toolUsed).toBe('document-search');
        expect(result.routingReason).toBe('fallback');
    });

    it('streams the synthesized answer', async () => {
        const h = harness({ route: 'document_search', answer: 'Light becomes energy.' });
        const chunks: string[] = [];

        const result = await h.buddy.query('What is photosynthesis?', {
            stream: { onChunk: (text) => chunks.push(text) },
        });

        expect(chunks.join('')).toBe('Light becomes energy.');
        expect(result.answerText).toBe('Light becomes energy.');
    });

    it('reports every state change', async () => {
        const h = harness({ route: 'document_search' });
        const seen: CycleState[] = [];

        await h.buddy.query('What is photosynthesis?', { onStateChange: (ctx) => seen.push(ctx.state) });

        expect(seen).toEqual(['routing', 'document-search', 'synthesizing', 'terminal']);
    });
});

describe('StudyBuddy web search', () => {
    it('uses the pages that could be fetched, capped per page', async () => {
        const search = new StubSearchClient([
            { url: 'https://a.example/1' },
            { url: 'https://b.example/2' },
            { url: 'https://c.example/3' },
        ]);
        const fetcher = new StubPageFetcher({
            'https://a.example/1': new Error('timeout'),
            'https://b.example/2': 'Mitochondria make energy.',
        });
        const h = harness({ route: 'web_search', search, fetcher });

        const result = await h.buddy.query('What do mitochondria do?');

        expect(result.toolUsed).toBe('web-search');
        expect(result.contextUsed).toEqual([{ text: 'Mitochondria make energy.', sourceId: 'https://b.example/2' }]);
        expect(h.search.queries[0]?.maxResults).toBe(3);
        expect(h.synthesizer.userPrompt()).toContain('CONTEXT:\nMitochondr\n');
    });

    it('still answers when the search finds no URLs', async () => {
        const h = harness({ route: 'web_search', search: new StubSearchClient([]), answer: 'I could not find that.' });

        const result = await h.buddy.query('What do mitochondria do?');

        expect(result.contextUsed).toEqual([]);
        expect(result.answerText).toBe('I could not find that.');
        expect(h.synthesizer.calls).toHaveLength(1);
        expect(h.synthesizer.userPrompt()).toContain(`CONTEXT:\n${EMPTY_WEB_MESSAGE}\n`);
        expect(states(result.history)).toEqual(['routing', 'web-search', 'synthesizing', 'terminal']);
    });

    it('tells the synthesizer when the search fails', async () => {
        const h = harness({ route: 'web_search', search: new StubSearchClient(new SearchError('quota exceeded')) });

        const result = await h.buddy.query('What do mitochondria do?');

        expect(result.contextUsed).toEqual([]);
        expect(h.synthesizer.userPrompt()).toContain(`CONTEXT:\n${EMPTY_WEB_MESSAGE}\n`);
    });
});

describe('StudyBuddy generators', () => {
    it('builds a quiz from a cue phrase without asking the router model', async () => {
        const h = harness({ answer: 'Q1. What pigment absorbs light?' });

        const result = await h.buddy.query('Create a quiz with 10 hard questions on photosynthesis');

        expect(h.router.calls).toHaveLength(0);
        expect(result.toolUsed).toBe('quiz');
        expect(result.routingReason).toBe('cue');
        expect(result.answerText).toBe('Q1. What pigment absorbs light?');
        expect(result.taskMetadata).toEqual({
            kind: 'quiz',
            topic: 'photosynthesis',
            numQuestions: 10,
            difficulty: 'hard',
        });
        expect(result.tokensUsed).toBe(15);
        expect(result.contextUsed).toEqual(BIO_CHUNKS);
        expect(h.context.queries[0]?.k).toBe(3);
        expect(states(result.history)).toEqual(['routing', 'quiz', 'terminal']);
    });

    it('uses the configured default card count', async () => {
        const h = harness({});

        const result = await h.buddy.query('Create flashcards on Data Structures');

        expect(result.taskMetadata).toEqual({ kind: 'flashcards', topic: 'Data Structures', numCards: 10 });
    });

    it('explains a concept chosen by the router model', async () => {
        const h = harness({ route: 'explain_concept' });

        const result = await h.buddy.query('Why do leaves change colour?');

        expect(result.taskMetadata).toEqual({
            kind: 'explain-concept',
            concept: 'Why do leaves change colour',
            difficulty: 'medium',
        });
        expect(result.tokensUsed).toBe(30);
    });

    it('passes the empty-store message to generators', async () => {
        const h = harness({ chunks: [] });

        const result = await h.buddy.query('List the important questions');

        expect(result.taskMetadata).toEqual({
            kind: 'important-questions',
            topic: 'the topics covered in the study materials',
            numQuestions: 10,
        });
        expect(h.generator.userPrompt()).toContain(`CONTEXT FROM STUDY MATERIALS:\n${EMPTY_STORE_MESSAGE}`);
    });

    it('plans from the session exam date without retrieval', async () => {
        const h = harness({ answer: 'Day 1: Graphs' });
        const session = new StudySession({ id: 'session-plan', examDate: '2026-10-14', clock });

        const result = await h.buddy.query('Create a study plan for Graphs, Trees, 4 hours per day', { session });

        expect(h.context.queries).toHaveLength(0);
        expect(result.contextUsed).toEqual([]);
        expect(result.taskMetadata).toEqual({
            kind: 'study-plan',
            topics: ['Graphs', 'Trees'],
            examDate: '2026-11-18',
            daysAvailable: 30,
            hoursPerDay: 4,
            examDateAdjusted: true,
            requestedExamDate: '2026-10-14',
        });
        expect(session.messages[1]?.toolUsed).toBe('study-plan');
    });

    it('sends the whole question to the long-form generator', async () => {
        const h = harness({});

        const result = await h.buddy.query('Write a 16 mark answer on deadlocks');

        expect(result.taskMetadata).toEqual({
            kind: 'long-form-answer',
            question: 'Write a 16 mark answer on deadlocks',
            marks: 16,
        });
    });
});

describe('StudyBuddy requested tasks', () => {
    it('plans the given topics as-is without routing', async () => {
        const h = harness({ answer: 'Day 1: Hypothesis tests' });
        const session = new StudySession({ id: 'session-task', clock });

        const result = await h.buddy.query('Study plan for Hypothesis tests, Data Structures in C', {
            session,
            task: {
                branch: 'study-plan',
                topics: ['Hypothesis tests', 'Data Structures in C'],
                examDate: '2026-11-02',
                hoursPerDay: 2,
            },
        });

        expect(h.router.calls).toHaveLength(0);
        expect(result.toolUsed).toBe('study-plan');
        expect(result.routingReason).toBe('requested');
        expect(result.tokensUsed).toBe(15);
        expect(result.taskMetadata).toEqual({
            kind: 'study-plan',
            topics: ['Hypothesis tests', 'Data Structures in C'],
            examDate: '2026-11-02',
            daysAvailable: 14,
            hoursPerDay: 2,
            examDateAdjusted: false,
            requestedExamDate: '2026-11-02',
        });
        expect(h.generator.userPrompt()).toContain('- Topics to cover:\n  - Hypothesis tests\n  - Data Structures in C\n');
        expect(states(result.history)).toEqual(['routing', 'study-plan', 'terminal']);
        expect(session.messages[0]?.content).toBe('Study plan for Hypothesis tests, Data Structures in C');
    });

    it('keeps a quiz topic intact and fills unset parameters from config', async () => {
        const h = harness({});

        const given = await h.buddy.query('Quiz on Hypothesis tests', {
            task: { branch: 'quiz', topic: 'Hypothesis tests', numQuestions: 5, difficulty: 'easy' },
        });
        const defaulted = await h.buddy.query('Quiz on Hard disk scheduling', {
            task: { branch: 'quiz', topic: 'Hard disk scheduling' },
        });

        expect(given.taskMetadata).toEqual({ kind: 'quiz', topic: 'Hypothesis tests', numQuestions: 5, difficulty: 'easy' });
        expect(defaulted.taskMetadata).toEqual({
            kind: 'quiz',
            topic: 'Hard disk scheduling',
            numQuestions: 5,
            difficulty: 'medium',
        });
        expect(h.context.queries).toEqual([
            { query: 'Quiz on Hypothesis tests', k: 3 },
            { query: 'Quiz on Hard disk scheduling', k: 3 },
        ]);
        expect(h.router.calls).toHaveLength(0);
    });
});

describe('StudyBuddy failures', () => {
    it('rejects an empty question before routing', async () => {
        const h = harness({});

        await expect(h.buddy.query('   ')).rejects.toThrow(ValidationError);
        expect(h.router.calls).toHaveLength(0);
    });

    it('leaves the session untouched when a model call fails', async () => {
        const h = harness({ route: 'document_search', answer: new Error('model offline') });
        const session = new StudySession({ id: 'session-fail', clock });

        await expect(h.buddy.query('What is photosynthesis?', { session })).rejects.toThrow(ProviderError);
        expect(session.messages).toHaveLength(0);
    });
});

describe('formatUserFacingError', () => {
    it('adds a doctor hint for service errors', () => {
        expect(formatUserFacingError(new ProviderError('ollama API error: 500 Internal Server Error'))).toBe(
            'Sorry, I couldn\'t answer that. ollama API error: 500 Internal Server Error\n' +
                'Check your configuration and services with "studymate doctor".',
        );
    });

    it('omits the hint for invalid input', () => {
        expect(formatUserFacingError(new ValidationError('Invalid question: Value cannot be empty'))).toBe(
            'Sorry, I couldn\'t answer that. Invalid question: Value cannot be empty',
        );
    });

    it('handles non-Error values', () => {
        expect(formatUserFacingError('boom')).toBe('Sorry, I couldn\'t answer that. boom');
    });
});

describe('joinChunks', () => {
    it('joins with blank lines and caps each chunk', () => {
        expect(joinChunks(BIO_CHUNKS, 14)).toBe('Photosynthesis\n\nChlorophyll ab');
    });
});
