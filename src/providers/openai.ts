/**
 * OpenAI-compatible Chat Completions adapter.
 *
 * Talks to any endpoint that speaks the OpenAI wire format (OpenAI itself,
 * Groq at https://api.groq.com/openai) directly via fetch(), no SDK.
 *
 * Dependency direction: openai.ts → providers/types.ts, providers/http.ts, core/errors.ts
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
import { classifyModelId } from './metadata.js';
import { logger } from '../utils/logger.js';

/** Configuration required to create an OpenAI provider. */
export interface OpenAIProviderConfig {
  readonly apiKey: string;
  readonly baseUrl?: string;
  readonly organization?: string;
}

/** Default OpenAI API settings. */
const DEFAULTS = {
  baseUrl: 'https://api.openai.com',
  model: 'gpt-4o-mini',
  maxTokens: 4096,
} as const;

const completionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().default('') }).optional(),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().default(0),
      completion_tokens: z.number().default(0),
    })
    .optional(),
});

const streamEventSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.string().nullable().optional() }).optional(),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .default([]),
});

const modelsSchema = z.object({
  data: z.array(z.object({ id: z.string() })).default([]),
});

/** Context windows for the common hosted models; others report none. */
const CONTEXT_WINDOWS: Record<string, number> = {
  'gpt-4o': 128000,
  'gpt-4o-mini': 128000,
  'gpt-4-turbo': 128000,
  'gpt-3.5-turbo': 16385,
  'llama-3.1-8b-instant': 131072,
  'llama-3.3-70b-versatile': 131072,
};

/**
 * OpenAI-compatible provider implementation.
 */
export class OpenAIProvider implements LLMProvider {
  public readonly name = 'openai' as const;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly organization?: string;

  constructor(config: OpenAIProviderConfig) {
    if (!config.apiKey) {
      throw new ProviderError('OpenAI API key is required', { provider: 'openai' });
    }
    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl ?? DEFAULTS.baseUrl).replace(/\/+$/, '');
    this.organization = config.organization;
  }

  async chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
    const body = this.buildBody(messages, options, false);

    logger.debug(`OpenAI chat request: model=${body.model}, messages=${body.messages.length}`);

    const response = await requestJson(
      {
        provider: 'openai',
        url: `${this.baseUrl}/v1/chat/completions`,
        headers: this.getHeaders(),
        body,
      },
      completionSchema,
    );

    const choice = response.choices[0];
    const promptTokens = response.usage?.prompt_tokens ?? 0;
    const completionTokens = response.usage?.completion_tokens ?? 0;

    return {
      content: choice?.message?.content ?? '',
      model: response.model ?? body.model,
      usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
      finishReason: choice?.finish_reason ?? 'unknown',
    };
  }

  async *stream(messages: ChatMessage[], options?: ChatOptions): AsyncIterable<ChatChunk> {
    const response = await sendRequest({
      provider: 'openai',
      url: `${this.baseUrl}/v1/chat/completions`,
      headers: this.getHeaders(),
      body: this.buildBody(messages, options, true),
    });

    for await (const line of readLines(response, 'openai')) {
      if (!line.startsWith('data: ')) continue;
      const data = line.slice(6).trim();
      if (data === '[DONE]') {
        yield { content: '', done: true };
        return;
      }

      const parsed = streamEventSchema.safeParse(parseJsonLine(data));
      if (!parsed.success) continue;

      const choice = parsed.data.choices[0];
      const content = choice?.delta?.content ?? '';
      const finished = choice?.finish_reason !== undefined && choice.finish_reason !== null;

      if (content) {
        yield { content, done: finished };
      } else if (finished) {
        yield { content: '', done: true };
        return;
      }
    }

    yield { content: '', done: true };
  }

  async listModels(): Promise<ModelInfo[]> {
    const data = await requestJson(
      {
        provider: 'openai',
        url: `${this.baseUrl}/v1/models`,
        method: 'GET',
        headers: this.getHeaders(),
      },
      modelsSchema,
    );

    return data.data.map((m) => ({
      id: m.id,
      name: m.id,
      provider: 'openai' as const,
      kind: classifyModelId(m.id),
      contextWindow: CONTEXT_WINDOWS[m.id],
    }));
  }

  async validateConnection(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/v1/models`, {
        method: 'GET',
        headers: this.getHeaders(),
      });
      return response.ok;
    } catch (err) {
      logger.debug(`OpenAI health check failed: ${String(err)}`);
      return false;
    }
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiKey}`,
    };

    if (this.organization) {
      headers['OpenAI-Organization'] = this.organization;
    }

    return headers;
  }

  /** OpenAI accepts the system prompt as the first message. */
  private buildBody(messages: ChatMessage[], options: ChatOptions | undefined, stream: boolean) {
    const apiMessages: Array<{ role: string; content: string }> = [];

    if (options?.systemPrompt) {
      apiMessages.push({ role: 'system', content: options.systemPrompt });
    }
    for (const msg of messages) {
      apiMessages.push({ role: msg.role, content: msg.content });
    }

    return {
      model: options?.model ?? DEFAULTS.model,
      messages: apiMessages,
      max_tokens: options?.maxTokens ?? DEFAULTS.maxTokens,
      stream,
      ...(options?.temperature !== undefined ? { temperature: options.temperature } : {}),
    };
  }
}
