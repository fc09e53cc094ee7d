/**
 * Centralized provider display metadata.
 *
 * Single source of truth for provider labels, default models and the
 * description text used in the init wizard.
 *
 * Dependency direction: metadata.ts → providers/types.ts (leaf-ish module)
 * Used by: cli/commands/init.ts, cli/commands/doctor.ts, model listing in the adapters
 */

import type { LLMProviderName, ModelKind } from './types.js';

/** Human-friendly labels for each provider. */
export const PROVIDER_LABELS: Record<LLMProviderName, string> = {
    anthropic: 'Anthropic (Claude)',
    ollama: 'Ollama (Local)',
    openai: 'OpenAI-compatible (OpenAI, Groq)',
};

/** Default chat model ID to use when the user does not specify one. */
export const PROVIDER_DEFAULT_MODELS: Record<LLMProviderName, string> = {
    anthropic: 'claude-3-5-haiku-20241022',
    ollama: 'llama3.2:latest',
    openai: 'gpt-4o-mini',
};

/** Default embedding model per embedding-capable provider. */
export const EMBEDDING_DEFAULT_MODELS = {
    ollama: 'all-minilm',
    openai: 'text-embedding-3-small',
} as const;

/** Short description shown as the choice text in the init wizard's provider selector. */
export const PROVIDER_DESCRIPTIONS: Record<LLMProviderName, string> = {
    anthropic: 'Anthropic (Claude): requires API key',
    ollama: 'Ollama (Local Models): free, no API key needed',
    openai: 'OpenAI-compatible endpoint (OpenAI, Groq): requires API key',
};

/** Whether the provider needs an API key in its config block. */
export function providerNeedsApiKey(name: LLMProviderName): boolean {
    return name !== 'ollama';
}

const EMBEDDING_MODEL_PATTERN = /embed|minilm|\bbge\b|\be5-|\bgte-|nomic-bert/i;
const OTHER_MODEL_PATTERN = /whisper|\btts\b|tts-|dall-e|moderation|transcribe|audio|image|guard/i;

/**
 * Guess what a listed model is for from its ID. Neither Ollama's tag list
 * nor the OpenAI-compatible model list says so directly.
 */
export function classifyModelId(id: string): ModelKind {
    if (EMBEDDING_MODEL_PATTERN.test(id)) return 'embedding';
    if (OTHER_MODEL_PATTERN.test(id)) return 'other';
    return 'chat';
}
