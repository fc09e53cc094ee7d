/**
 * Anthropic Claude provider adapter.
 *
 * Uses the Anthropic Messages API directly via fetch(), no SDK dependency.
 *
 * Dependency direction: anthropic.ts → providers/types.ts, providers/http.ts, core/errors.ts
 * Used by: providers/registry.ts
 */

import { z } from 'zod';
import { ProviderError } from '../core/errors.js';
import type {
  LLMProvider,
  ChatMessage,
  ChatOptions,
  ChatResponse,
  ChatChunk,
  ModelInfo,
} from './types.js';
import { requestJson, sendRequest, readLines, parseJsonLine } from './http.js';
import { logger } from '../utils/logger.js';

/** Configuration required to create an Anthropic provider. */
export interface AnthropicProviderConfig {
  readonly apiKey: string;
  readonly baseUrl?: string;
  readonly apiVersion?: string;
}

/** Default Anthropic API settings. */
const DEFAULTS = {
  baseUrl: 'https://api.anthropic.com',
  apiVersion: '2023-06-01',
  model: 'claude-3-5-haiku-20241022',
  maxTokens: 4096,
} as const;

const messageSchema = z.object({
  model: z.string().optional(),
  content: z
    .array(z.object({ type: z.string(), text: z.string().optional() }))
    .default([]),
  stop_reason: z.string().nullable().optional(),
  usage: z
    .object({
      input_tokens: z.number().default(0),
      output_tokens: z.number().default(0),
    })
    .optional(),
});

const streamEventSchema = z.object({
  type: z.string(),
  delta: z.object({ text: z.string().optional() }).optional(),
});

/**
 * Anthropic Claude provider implementation.
 *
 * Handles system prompts separately (Anthropic uses a top-level `system` field).
 */
export class AnthropicProvider implements LLMProvider {
  public readonly name = 'anthropic' as const;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly apiVersion: string;

  constructor(config: AnthropicProviderConfig) {
    if (!config.apiKey) {
      throw new ProviderError('Anthropic API key is required', { provider: 'anthropic' });
    }
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? DEFAULTS.baseUrl;
    this.apiVersion = config.apiVersion ?? DEFAULTS.apiVersion;
  }

  async chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
    const body = this.buildBody(messages, options, false);

    logger.debug(`Anthropic chat request: model=${body.model}, messages=${body.messages.length}`);

    const response = await requestJson(
      {
        provider: 'anthropic',
        url: `${this.baseUrl}/v1/messages`,
        headers: this.getHeaders(),
        body,
      },
      messageSchema,
    );

    const promptTokens = response.usage?.input_tokens ?? 0;
    const completionTokens = response.usage?.output_tokens ?? 0;

    return {
      content: response.content
        .filter((block) => block.type === 'text')
        .map((block) => block.text ?? '')
        .join(''),
      model: response.model ?? body.model,
      usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
      finishReason: response.stop_reason ?? 'unknown',
    };
  }

  async *stream(messages: ChatMessage[], options?: ChatOptions): AsyncIterable<ChatChunk> {
    const response = await sendRequest({
      provider: 'anthropic',
      url: `${this.baseUrl}/v1/messages`,
      headers: this.getHeaders(),
      body: this.buildBody(messages, options, true),
    });

    for await (const line of readLines(response, 'anthropic')) {
      if (!line.startsWith('data: ')) continue;

      const parsed = streamEventSchema.safeParse(parseJsonLine(line.slice(6).trim()));
      if (!parsed.success) continue;

      const event = parsed.data;
      if (event.type === 'content_block_delta' && event.delta?.text) {
        yield { content: event.delta.text, done: false };
      } else if (event.type === 'message_stop') {
        yield { content: '', done: true };
        return;
      }
    }

    yield { content: '', done: true };
  }

  /**
   * Anthropic has no public models endpoint wired here; return the known models.
   */
  async listModels(): Promise<ModelInfo[]> {
    return [
      { id: 'claude-3-5-haiku-20241022', name: 'Claude 3.5 Haiku', provider: 'anthropic', kind: 'chat', contextWindow: 200000 },
      { id: 'claude-3-5-sonnet-20241022', name: 'Claude 3.5 Sonnet', provider: 'anthropic', kind: 'chat', contextWindow: 200000 },
      { id: 'claude-sonnet-4-20250514', name: 'Claude Sonnet 4', provider: 'anthropic', kind: 'chat', contextWindow: 200000 },
    ];
  }

  async validateConnection(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/v1/messages`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...this.getHeaders() },
        body: JSON.stringify({
          model: DEFAULTS.model,
          max_tokens: 1,
          messages: [{ role: 'user', content: 'ping' }],
        }),
      });

      // 400 means the key was accepted but the request was rejected
      return response.status === 200 || response.status === 400;
    } catch (err) {
      logger.debug(`Anthropic health check failed: ${String(err)}`);
      return false;
    }
  }

  private getHeaders(): Record<string, string> {
    return {
      'x-api-key': this.apiKey,
      'anthropic-version': this.apiVersion,
    };
  }

  /**
   * Move system messages into the top-level `system` field.
   */
  private buildBody(messages: ChatMessage[], options: ChatOptions | undefined, stream: boolean) {
    let systemPrompt = options?.systemPrompt;
    const apiMessages: Array<{ role: string; content: string }> = [];

    for (const msg of messages) {
      if (msg.role === 'system') {
        systemPrompt = systemPrompt ? `${systemPrompt}\n\n${msg.content}` : msg.content;
      } else {
        apiMessages.push({ role: msg.role, content: msg.content });
      }
    }

    return {
      model: options?.model ?? DEFAULTS.model,
      max_tokens: options?.maxTokens ?? DEFAULTS.maxTokens,
      messages: apiMessages,
      stream,
      ...(systemPrompt ? { system: systemPrompt } : {}),
      ...(options?.temperature !== undefined ? { temperature: options.temperature } : {}),
    };
  }
}
