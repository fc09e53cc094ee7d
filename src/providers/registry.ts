/**
 * Provider registry: factory that creates the correct provider from config.
 *
 * New providers are added by:
 * 1. Create the adapter file in src/providers/
 * 2. Register it in the PROVIDER_FACTORIES map below
 * 3. Add the name to LLMProviderName type in types.ts
 *
 * Dependency direction: registry.ts → types.ts, adapters, errors.ts
 * Used by: agent factory, CLI doctor and init commands
 */

import type { LLMProvider, LLMProviderName } from './types.js';
import { AnthropicProvider } from './anthropic.js';
import { OllamaProvider } from './ollama.js';
import { OpenAIProvider } from './openai.js';
import type { ProviderConfig } from '../core/config/types.js';
import { ProviderError } from '../core/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Factory functions for each provider.
 * Add new providers here: this is the ONLY place that needs to change.
 */
const PROVIDER_FACTORIES: Record<LLMProviderName, (config: ProviderConfig) => LLMProvider> = {
  anthropic: (config) => {
    if (!config.anthropic) {
      throw new ProviderError(
        'Anthropic provider is not configured. Run "studymate init" to set up.',
        { provider: 'anthropic' },
      );
    }
    return new AnthropicProvider(config.anthropic);
  },

  ollama: (config) => new OllamaProvider(config.ollama),

  openai: (config) => {
    if (!config.openai) {
      throw new ProviderError(
        'OpenAI-compatible provider is not configured. Run "studymate init" to set up.',
        { provider: 'openai' },
      );
    }
    return new OpenAIProvider(config.openai);
  },
};

const SUPPORTED_PROVIDERS: readonly LLMProviderName[] = ['anthropic', 'ollama', 'openai'];

/** Cache of created provider instances (one per provider name). */
const providerCache = new Map<LLMProviderName, LLMProvider>();

/**
 * Create (or return cached) a provider instance by name.
 *
 * @throws {ProviderError} if the provider's config block is missing
 */
export function createProvider(name: LLMProviderName, config: ProviderConfig): LLMProvider {
  const cached = providerCache.get(name);
  if (cached) return cached;

  logger.debug(`Creating provider: ${name}`);
  const provider = PROVIDER_FACTORIES[name](config);
  providerCache.set(name, provider);
  return provider;
}

/**
 * Clear the provider cache (useful for testing or config changes).
 */
export function clearProviderCache(): void {
  providerCache.clear();
}

export function getSupportedProviders(): LLMProviderName[] {
  return [...SUPPORTED_PROVIDERS];
}

/** Whether the providers section has a block for this provider. Ollama needs none. */
export function isProviderConfigured(name: LLMProviderName, config: ProviderConfig): boolean {
  return name === 'ollama' || config[name] !== undefined;
}

/**
 * Check connectivity for each named provider.
 * Providers without a config block report false without a request.
 */
export async function validateProviders(
  names: readonly LLMProviderName[],
  config: ProviderConfig,
): Promise<Record<string, boolean>> {
  const results: Record<string, boolean> = {};

  for (const name of new Set(names)) {
    if (!isProviderConfigured(name, config)) {
      results[name] = false;
      continue;
    }
    try {
      results[name] = await createProvider(name, config).validateConnection();
    } catch (err) {
      logger.debug(`Provider ${name} failed validation: ${String(err)}`);
      results[name] = false;
    }
  }

  return results;
}
