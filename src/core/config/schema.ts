/**
 * Zod schemas defining the complete configuration shape.
 *
 * This is the authoritative definition of what a valid config looks like.
 * All TypeScript types are inferred from these schemas via z.infer<>.
 *
 * Dependency direction: schema.ts → zod, utils/validation
 * Used by: manager.ts, init.ts, types.ts
 */

import { z } from 'zod';
import { difficultySchema } from '../../utils/validation.js';

export const llmProviderNameSchema = z.enum(['anthropic', 'ollama', 'openai']);

/**
 * Schema for one model-backed step (router, synthesizer or the generators).
 */
export const modelRoleConfigSchema = z.object({
    /** Which provider to use for this step. */
    provider: llmProviderNameSchema,
    /** The model identifier to use. */
    model: z.string().min(1),
    /** Sampling temperature (0.0 = deterministic, higher = more creative). */
    temperature: z.number().min(0).max(2).default(0.3),
    /** Maximum tokens the model can generate in a response. */
    maxTokens: z.number().int().min(1).max(200000).default(4096),
});

export const modelsConfigSchema = z.object({
    router: modelRoleConfigSchema,
    synthesizer: modelRoleConfigSchema,
    /** Shared by all six task generators. */
    generators: modelRoleConfigSchema,
});

export const anthropicProviderSchema = z.object({
    apiKey: z.string().min(1, 'Anthropic API key is required'),
    baseUrl: z.string().url().default('https://api.anthropic.com'),
    apiVersion: z.string().default('2023-06-01'),
});

export const ollamaProviderSchema = z.object({
    baseUrl: z.string().url().default('http://localhost:11434'),
});

/**
 * Any OpenAI-compatible Chat Completions endpoint. Point `baseUrl` at
 * https://api.groq.com/openai to use Groq-hosted models.
 */
export const openaiProviderSchema = z.object({
    apiKey: z.string().min(1, 'OpenAI API key is required'),
    baseUrl: z.string().url().default('https://api.openai.com'),
    organization: z.string().optional(),
});

export const providerConfigSchema = z.object({
    anthropic: anthropicProviderSchema.optional(),
    ollama: ollamaProviderSchema.optional(),
    openai: openaiProviderSchema.optional(),
});

/**
 * Embedding model settings. Connection details come from the matching
 * entry in `providers`.
 */
export const embeddingsConfigSchema = z.object({
    provider: z.enum(['ollama', 'openai']),
    model: z.string().min(1),
});

export const knowledgeConfigSchema = z.object({
    /** Uploaded source files; each basename is a chunk's source id. */
    documentsDir: z.string().min(1).default('knowledge-base'),
    /** Persisted vector index directory. */
    indexDir: z.string().min(1).default('.studymate/vector-index'),
    chunkSize: z.number().int().min(100).max(20000).default(1000),
    chunkOverlap: z.number().int().min(0).max(5000).default(200),
    defaultSubject: z.string().min(1).default('General'),
}).refine((k) => k.chunkOverlap < k.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
});

const topK = z.number().int().min(1).max(50);

/** Number of index chunks retrieved per branch (study-plan retrieves none). */
export const retrievalConfigSchema = z.object({
    topK: z.object({
        'document-search': topK.default(5),
        'long-form-answer': topK.default(5),
        quiz: topK.default(3),
        flashcards: topK.default(5),
        'explain-concept': topK.default(5),
        'important-questions': topK.default(5),
    }).default({}),
});

export const searchConfigSchema = z.object({
    /** Tavily API key. Falls back to the TAVILY_API_KEY environment variable. */
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().default('https://api.tavily.com'),
    maxResults: z.number().int().min(1).max(10).default(3),
    searchDepth: z.enum(['basic', 'advanced']).default('advanced'),
    includeDomains: z.array(z.string().min(1)).default([]),
    /** Characters kept from each fetched page when building prompt context. */
    contextCharLimit: z.number().int().min(100).max(100000).default(1000),
    fetchTimeoutMs: z.number().int().min(1000).max(120000).default(20000),
});

export const studyConfigSchema = z.object({
    hoursPerDay: z.number().min(0.5).max(24).default(3),
    quizQuestions: z.number().int().min(1).max(50).default(5),
    quizDifficulty: difficultySchema.default('medium'),
    flashcards: z.number().int().min(1).max(100).default(10),
    importantQuestions: z.number().int().min(1).max(50).default(10),
    explainDifficulty: difficultySchema.default('medium'),
});

/**
 * The complete application configuration schema.
 * This is the single source of truth for config structure.
 */
export const appConfigSchema = z.object({
    /** Schema version for future migrations. */
    version: z.literal(1).default(1),
    providers: providerConfigSchema,
    models: modelsConfigSchema,
    embeddings: embeddingsConfigSchema,
    knowledge: knowledgeConfigSchema.default({}),
    retrieval: retrievalConfigSchema.default({}),
    search: searchConfigSchema.default({}),
    study: studyConfigSchema.default({}),
});
