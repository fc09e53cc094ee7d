/**
 * TypeScript types inferred from Zod schemas.
 *
 * NEVER define config types manually: they are always derived
 * from the Zod schemas to guarantee runtime and compile-time agreement.
 *
 * Dependency direction: types.ts → schema.ts
 * Used by: every module that touches config
 */

import { z } from 'zod';
import {
    appConfigSchema,
    embeddingsConfigSchema,
    knowledgeConfigSchema,
    modelRoleConfigSchema,
    modelsConfigSchema,
    providerConfigSchema,
    retrievalConfigSchema,
    searchConfigSchema,
    studyConfigSchema,
} from './schema.js';

/** Complete application configuration. */
export type AppConfig = z.infer<typeof appConfigSchema>;

/** LLM provider connection settings. */
export type ProviderConfig = z.infer<typeof providerConfigSchema>;

/** Model assignments for the router, synthesizer and generators. */
export type ModelsConfig = z.infer<typeof modelsConfigSchema>;

/** Configuration for a single model-backed step. */
export type ModelRoleConfig = z.infer<typeof modelRoleConfigSchema>;

export type EmbeddingsConfig = z.infer<typeof embeddingsConfigSchema>;

/** Document directory, index directory and chunking settings. */
export type KnowledgeConfig = z.infer<typeof knowledgeConfigSchema>;

export type RetrievalConfig = z.infer<typeof retrievalConfigSchema>;

/** Web search and page fetch settings. */
export type SearchConfig = z.infer<typeof searchConfigSchema>;

/** Default generator parameters. */
export type StudyConfig = z.infer<typeof studyConfigSchema>;
