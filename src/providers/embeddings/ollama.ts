/**
 * Ollama embeddings via POST /api/embed.
 *
 * Dependency direction: embeddings/ollama.ts → embeddings/types.ts, providers/http.ts
 * Used by: embeddings/registry.ts
 */

import { z } from 'zod';
import type { EmbeddingProvider } from './types.js';
import { requestJson } from '../http.js';
import { ProviderError } from '../../core/errors.js';
import { logger } from '../../utils/logger.js';

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  public readonly name = 'ollama' as const;
  private readonly baseUrl: string;

  constructor(
    public readonly model: string,
    baseUrl = 'http://localhost:11434',
  ) {
    this.baseUrl = baseUrl;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    logger.debug(`Ollama embed request: model=${this.model}, inputs=${texts.length}`);

    const data = await requestJson(
      {
        provider: 'ollama',
        url: `${this.baseUrl}/api/embed`,
        body: { model: this.model, input: texts },
      },
      embedResponseSchema,
    );

    if (data.embeddings.length !== texts.length) {
      throw new ProviderError(
        `Ollama returned ${data.embeddings.length} embeddings for ${texts.length} inputs`,
        { provider: 'ollama', model: this.model },
      );
    }
    return data.embeddings;
  }

  async validateConnection(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      return response.ok;
    } catch (err) {
      logger.debug(`Ollama embeddings health check failed: ${String(err)}`);
      return false;
    }
  }
}
