/**
 * Builds the configured embedding provider.
 *
 * Dependency direction: embeddings/registry.ts → adapters, config types, errors
 * Used by: study assistant factory, ingest and doctor commands
 */

import type { EmbeddingProvider } from './types.js';
import { OllamaEmbeddingProvider } from './ollama.js';
import { OpenAIEmbeddingProvider } from './openai.js';
import type { EmbeddingsConfig, ProviderConfig } from '../../core/config/types.js';
import { ProviderError } from '../../core/errors.js';

export function createEmbeddingProvider(
  embeddings: EmbeddingsConfig,
  providers: ProviderConfig,
): EmbeddingProvider {
  switch (embeddings.provider) {
    case 'ollama':
      return new OllamaEmbeddingProvider(embeddings.model, providers.ollama?.baseUrl);
    case 'openai':
      if (!providers.openai) {
        throw new ProviderError(
          'Embeddings use the OpenAI-compatible provider, but it is not configured. Run "studymate init".',
          { provider: 'openai' },
        );
      }
      return new OpenAIEmbeddingProvider(embeddings.model, providers.openai);
  }
}
