/**
 * OpenAI-compatible embeddings via POST /v1/embeddings.
 *
 * Dependency direction: embeddings/openai.ts → embeddings/types.ts, providers/http.ts
 * Used by: embeddings/registry.ts
 */

import { z } from 'zod';
import type { EmbeddingProvider } from './types.js';
import { requestJson } from '../http.js';
import { ProviderError } from '../../core/errors.js';
import { logger } from '../../utils/logger.js';

const embeddingsResponseSchema = z.object({
  data: z.array(z.object({ index: z.number().int().optional(), embedding: z.array(z.number()) })),
});

export interface OpenAIEmbeddingConfig {
  readonly apiKey: string;
  readonly baseUrl?: string;
  readonly organization?: string;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  public readonly name = 'openai' as const;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly organization?: string;

  constructor(
    public readonly model: string,
    config: OpenAIEmbeddingConfig,
  ) {
    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl ?? 'https://api.openai.com').replace(/\/+$/, '');
    this.organization = config.organization;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    logger.debug(`OpenAI embed request: model=${this.model}, inputs=${texts.length}`);

    const data = await requestJson(
      {
        provider: 'openai',
        url: `${this.baseUrl}/v1/embeddings`,
        headers: this.getHeaders(),
        body: { model: this.model, input: texts },
      },
      embeddingsResponseSchema,
    );

    if (data.data.length !== texts.length) {
      throw new ProviderError(
        `OpenAI returned ${data.data.length} embeddings for ${texts.length} inputs`,
        { provider: 'openai', model: this.model },
      );
    }

    // Items carry their input position; restore input order when present.
    return [...data.data]
      .map((item, position) => ({ order: item.index ?? position, embedding: item.embedding }))
      .sort((a, b) => a.order - b.order)
      .map((item) => item.embedding);
  }

  async validateConnection(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/v1/models`, { headers: this.getHeaders() });
      return response.ok;
    } catch (err) {
      logger.debug(`OpenAI embeddings health check failed: ${String(err)}`);
      return false;
    }
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = { Authorization: `Bearer ${this.apiKey}` };
    if (this.organization) headers['OpenAI-Organization'] = this.organization;
    return headers;
  }
}
