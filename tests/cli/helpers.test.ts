import { describe, it, expect } from 'vitest';
import { buildQuizRequest } from '../../src/cli/commands/quiz.js';
import { buildPlanRequest } from '../../src/cli/commands/plan.js';
import { maskSecret, redactConfig } from '../../src/cli/commands/config.js';
import { formatSize } from '../../src/cli/commands/docs.js';
import { providersInUse } from '../../src/cli/commands/doctor.js';
import { uniqueSources } from '../../src/cli/utils/stream-renderer.js';
import { getDefaultConfig } from '../../src/core/config/manager.js';

describe('buildQuizRequest', () => {
    it('hands the topic and settings to the quiz generator unchanged', () => {
        expect(buildQuizRequest('  Hypothesis tests ', 5, 'easy')).toEqual({
            question: 'Quiz on Hypothesis tests',
            task: { branch: 'quiz', topic: 'Hypothesis tests', numQuestions: 5, difficulty: 'easy' },
        });
    });

    it('leaves unspecified settings for the configured defaults', () => {
        expect(buildQuizRequest('cells').task).toEqual({
            branch: 'quiz',
            topic: 'cells',
            numQuestions: undefined,
            difficulty: undefined,
        });
    });
});

describe('buildPlanRequest', () => {
    it('keeps every topic, the exam date and the hours', () => {
        expect(buildPlanRequest(['Hypothesis tests', 'Data Structures in C', ' '], '2026-12-01', 4)).toEqual({
            question: 'Study plan for Hypothesis tests, Data Structures in C',
            task: {
                branch: 'study-plan',
                topics: ['Hypothesis tests', 'Data Structures in C'],
                examDate: '2026-12-01',
                hoursPerDay: 4,
            },
        });
    });
});

describe('maskSecret', () => {
    it('keeps only the last four characters', () => {
        expect(maskSecret('test-secret')).toBe('****cret');
        expect(maskSecret('abcd')).toBe('****');
    });
});

describe('redactConfig', () => {
    it('masks every API key and leaves the rest alone', () => {
        const config = getDefaultConfig({
            providers: { openai: { apiKey: 'test-secret', baseUrl: 'https://api.groq.com/openai' } },
            search: { apiKey: 'tavily-placeholder' },
        });

        const redacted = redactConfig(config);

        expect(redacted.providers.openai?.apiKey).toBe('****lder');
        expect(redacted.providers.openai?.baseUrl).toBe('https://api.groq.com/openai');
        expect(redacted.search.apiKey).toBe('****lder');
        expect(config.providers.openai?.apiKey).toBe('test-secret');
    });
});

describe('formatSize', () => {
    it('picks a readable unit', () => {
        expect(formatSize(512)).toBe('512 B');
        expect(formatSize(2048)).toBe('2.0 KB');
        expect(formatSize(3 * 1024 * 1024)).toBe('3.0 MB');
    });
});

describe('providersInUse', () => {
    it('lists each configured model provider once', () => {
        const config = getDefaultConfig();
        config.models.synthesizer = { ...config.models.synthesizer, provider: 'anthropic' };

        expect(providersInUse(config)).toEqual(['ollama', 'anthropic']);
    });
});

describe('uniqueSources', () => {
    it('deduplicates source ids in order', () => {
        expect(
            uniqueSources({
                contextUsed: [
                    { text: 'a', sourceId: 'bio.pdf' },
                    { text: 'b', sourceId: 'https://a.example/1' },
                    { text: 'c', sourceId: 'bio.pdf' },
                ],
            }),
        ).toEqual(['bio.pdf', 'https://a.example/1']);
    });
});
