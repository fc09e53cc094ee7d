/**
 * Ollama local model provider adapter.
 *
 * Connects to the Ollama HTTP API (default: http://localhost:11434).
 * Supports chat completion, streaming, model listing, and health checks.
 *
 * Dependency direction: ollama.ts → providers/types.ts, providers/http.ts, core/errors.ts
 * Used by: providers/registry.ts
 */

import { z } from 'zod';
import type {
  LLMProvider,
  ChatMessage,
  ChatOptions,
  ChatResponse,
  ChatChunk,
  ModelInfo,
} from './types.js';
import { requestJson, sendRequest, readLines, parseJsonLine } from './http.js';
import { classifyModelId } from './metadata.js';
import { logger } from '../utils/logger.js';

/** Configuration required to create an Ollama provider. */
export interface OllamaProviderConfig {
  readonly baseUrl?: string;
}

/** Default Ollama settings. */
const DEFAULTS = {
  baseUrl: 'http://localhost:11434',
  model: 'llama3.2:latest',
  timeoutMs: 300_000,
} as const;

const chatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({ content: z.string().default('') }).optional(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

const streamLineSchema = z.object({
  message: z.object({ content: z.string().default('') }).optional(),
  done: z.boolean().default(false),
});

const tagsSchema = z.object({
  models: z.array(z.object({ name: z.string().optional(), model: z.string().optional() })).default([]),
});

/**
 * Ollama local model provider implementation.
 */
export class OllamaProvider implements LLMProvider {
  public readonly name = 'ollama' as const;
  private readonly baseUrl: string;

  constructor(config?: OllamaProviderConfig) {
    this.baseUrl = config?.baseUrl ?? DEFAULTS.baseUrl;
  }

  async chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
    const model = options?.model ?? DEFAULTS.model;
    const body = this.buildBody(messages, options, false);

    logger.debug(`Ollama chat request: model=${model}, messages=${body.messages.length}`);

    const response = await requestJson(
      {
        provider: 'ollama',
        url: `${this.baseUrl}/api/chat`,
        body,
        signal: AbortSignal.timeout(DEFAULTS.timeoutMs),
      },
      chatResponseSchema,
    );

    const promptTokens = response.prompt_eval_count ?? 0;
    const completionTokens = response.eval_count ?? 0;

    return {
      content: response.message?.content ?? '',
      model: response.model ?? model,
      usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
      finishReason: response.done_reason ?? 'stop',
    };
  }

  async *stream(messages: ChatMessage[], options?: ChatOptions): AsyncIterable<ChatChunk> {
    const response = await sendRequest({
      provider: 'ollama',
      url: `${this.baseUrl}/api/chat`,
      body: this.buildBody(messages, options, true),
    });

    for await (const line of readLines(response, 'ollama')) {
      const parsed = streamLineSchema.safeParse(parseJsonLine(line));
      if (!parsed.success) continue;

      const content = parsed.data.message?.content ?? '';
      if (content || parsed.data.done) {
        yield { content, done: parsed.data.done };
      }
      if (parsed.data.done) return;
    }

    yield { content: '', done: true };
  }

  async listModels(): Promise<ModelInfo[]> {
    const data = await requestJson(
      { provider: 'ollama', url: `${this.baseUrl}/api/tags`, method: 'GET' },
      tagsSchema,
    );

    return data.models.map((m) => ({
      id: m.name ?? m.model ?? '',
      name: m.name ?? m.model ?? 'Unknown',
      provider: 'ollama' as const,
      kind: classifyModelId(m.name ?? m.model ?? ''),
    }));
  }

  async validateConnection(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      return response.ok;
    } catch (err) {
      logger.debug(`Ollama health check failed: ${String(err)}`);
      return false;
    }
  }

  private buildBody(messages: ChatMessage[], options: ChatOptions | undefined, stream: boolean) {
    const ollamaMessages: Array<{ role: string; content: string }> = [];

    if (options?.systemPrompt) {
      ollamaMessages.push({ role: 'system', content: options.systemPrompt });
    }
    for (const msg of messages) {
      ollamaMessages.push({ role: msg.role, content: msg.content });
    }

    const modelOptions: Record<string, number> = {};
    if (options?.temperature !== undefined) modelOptions.temperature = options.temperature;
    if (options?.maxTokens !== undefined) modelOptions.num_predict = options.maxTokens;

    return {
      model: options?.model ?? DEFAULTS.model,
      messages: ollamaMessages,
      stream,
      options: modelOptions,
    };
  }
}
