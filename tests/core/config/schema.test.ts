/**
 * Tests for the config Zod schemas.
 *
 * Verifies that valid configs pass and invalid configs are rejected.
 */

import { describe, it, expect } from 'vitest';
import {
    appConfigSchema,
    modelRoleConfigSchema,
    knowledgeConfigSchema,
    searchConfigSchema,
    retrievalConfigSchema,
    studyConfigSchema,
} from '../../../src/core/config/schema.js';
import { DEFAULT_CONFIG } from '../../../src/core/config/defaults.js';

describe('modelRoleConfigSchema', () => {
    it('accepts a valid model config', () => {
        const result = modelRoleConfigSchema.safeParse({
            provider: 'openai',
            model: 'llama-3.3-70b-versatile',
            temperature: 0.7,
            maxTokens: 4096,
        });
        expect(result.success).toBe(true);
    });

    it('applies defaults for temperature and maxTokens', () => {
        const result = modelRoleConfigSchema.safeParse({ provider: 'ollama', model: 'llama3.2:latest' });
        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.data.temperature).toBe(0.3);
            expect(result.data.maxTokens).toBe(4096);
        }
    });

    it('rejects an unknown provider', () => {
        expect(modelRoleConfigSchema.safeParse({ provider: 'invalid-provider', model: 'x' }).success).toBe(false);
    });

    it('rejects empty model string', () => {
        expect(modelRoleConfigSchema.safeParse({ provider: 'anthropic', model: '' }).success).toBe(false);
    });

    it('rejects temperature above 2', () => {
        expect(modelRoleConfigSchema.safeParse({ provider: 'ollama', model: 'm', temperature: 2.5 }).success).toBe(false);
    });
});

describe('knowledgeConfigSchema', () => {
    it('applies chunking defaults', () => {
        const result = knowledgeConfigSchema.parse({});
        expect(result).toEqual({
            documentsDir: 'knowledge-base',
            indexDir: '.studymate/vector-index',
            chunkSize: 1000,
            chunkOverlap: 200,
            defaultSubject: 'General',
        });
    });

    it('rejects an overlap as large as the chunk size', () => {
        const result = knowledgeConfigSchema.safeParse({ chunkSize: 500, chunkOverlap: 500 });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.issues[0]?.path).toEqual(['chunkOverlap']);
        }
    });
});

describe('retrievalConfigSchema', () => {
    it('defaults k per branch', () => {
        expect(retrievalConfigSchema.parse({}).topK).toEqual({
            'document-search': 5,
            'long-form-answer': 5,
            quiz: 3,
            flashcards: 5,
            'explain-concept': 5,
            'important-questions': 5,
        });
    });
});

describe('searchConfigSchema', () => {
    it('applies defaults', () => {
        const result = searchConfigSchema.parse({});
        expect(result.maxResults).toBe(3);
        expect(result.contextCharLimit).toBe(1000);
        expect(result.fetchTimeoutMs).toBe(20000);
        expect(result.includeDomains).toEqual([]);
        expect(result.apiKey).toBeUndefined();
    });

    it('rejects an invalid base URL', () => {
        expect(searchConfigSchema.safeParse({ baseUrl: 'not a url' }).success).toBe(false);
    });
});

describe('studyConfigSchema', () => {
    it('rejects an unknown difficulty', () => {
        expect(studyConfigSchema.safeParse({ quizDifficulty: 'extreme' }).success).toBe(false);
    });
});

describe('appConfigSchema', () => {
    it('accepts the default config', () => {
        expect(appConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
    });

    it('requires the models section', () => {
        const { models: _models, ...rest } = DEFAULT_CONFIG;
        expect(appConfigSchema.safeParse(rest).success).toBe(false);
    });

    it('rejects an anthropic block without an API key', () => {
        const result = appConfigSchema.safeParse({
            ...DEFAULT_CONFIG,
            providers: { anthropic: { apiKey: '' } },
        });
        expect(result.success).toBe(false);
    });
});
