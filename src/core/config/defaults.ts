/**
 * Default configuration values.
 *
 * The init wizard overrides these based on user choices.
 *
 * Dependency direction: defaults.ts → types.ts
 * Used by: manager.ts, init.ts
 */

import type { AppConfig, ModelRoleConfig } from './types.js';

/**
 * Default model step: a local Ollama model, so a fresh install works
 * without any API key.
 */
const DEFAULT_MODEL_ROLE: ModelRoleConfig = {
    provider: 'ollama',
    model: 'llama3.2:latest',
    temperature: 0.3,
    maxTokens: 4096,
};

export const DEFAULT_CONFIG: AppConfig = {
    version: 1,

    providers: {
        ollama: {
            baseUrl: 'http://localhost:11434',
        },
    },

    models: {
        router: { ...DEFAULT_MODEL_ROLE, temperature: 0, maxTokens: 64 },
        synthesizer: { ...DEFAULT_MODEL_ROLE },
        generators: { ...DEFAULT_MODEL_ROLE, maxTokens: 8192 },
    },

    embeddings: {
        provider: 'ollama',
        model: 'all-minilm',
    },

    knowledge: {
        documentsDir: 'knowledge-base',
        indexDir: '.studymate/vector-index',
        chunkSize: 1000,
        chunkOverlap: 200,
        defaultSubject: 'General',
    },

    retrieval: {
        topK: {
            'document-search': 5,
            'long-form-answer': 5,
            quiz: 3,
            flashcards: 5,
            'explain-concept': 5,
            'important-questions': 5,
        },
    },

    search: {
        baseUrl: 'https://api.tavily.com',
        maxResults: 3,
        searchDepth: 'advanced',
        includeDomains: [],
        contextCharLimit: 1000,
        fetchTimeoutMs: 20000,
    },

    study: {
        hoursPerDay: 3,
        quizQuestions: 5,
        quizDifficulty: 'medium',
        flashcards: 10,
        importantQuestions: 10,
        explainDifficulty: 'medium',
    },
};

/** The directory name where config, prompts and sessions live inside a project. */
export const CONFIG_DIR_NAME = '.studymate';

export const CONFIG_FILE_NAME = 'config.json';
