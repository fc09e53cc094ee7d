/**
 * Chat backend contract shared by the router, synthesizer and generators.
 *
 * Each agent issues one chat call per question with its own model settings
 * (the router asks for a single keyword at temperature 0 and a small
 * maxTokens; generators ask for long markdown answers), so the options
 * carry exactly those settings and nothing else.
 *
 * Dependency direction: providers/types.ts → nothing (leaf module)
 * Used by: provider adapters, registry, agents, model picker, doctor command
 */

/** Chat backends studymate can talk to. The OpenAI adapter also covers Groq. */
export type LLMProviderName = 'anthropic' | 'ollama' | 'openai';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

/** Per-call settings, filled from the calling agent's model config. */
export interface ChatOptions {
  readonly model?: string;
  readonly temperature?: number;
  /** Response cap; the router keeps this small since it only needs a branch keyword. */
  readonly maxTokens?: number;
  /** The agent's role prompt. Anthropic sends it as the top-level system field. */
  readonly systemPrompt?: string;
}

export interface ChatResponse {
  readonly content: string;
  readonly model: string;
  readonly usage: TokenUsage;
  /** Backend-specific finish reason, kept for debug logging. */
  readonly finishReason: string;
}

/** One streamed fragment of a synthesizer or generator answer. */
export interface ChatChunk {
  readonly content: string;
  readonly done: boolean;
}

export interface TokenUsage {
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
}

/**
 * What a listed model is for. Agents need `chat` models; the knowledge
 * base needs an `embedding` model. Audio, image and moderation models are `other`.
 */
export type ModelKind = 'chat' | 'embedding' | 'other';

/** A model as offered in the init wizard's pickers. */
export interface ModelInfo {
  readonly id: string;
  readonly name: string;
  readonly provider: LLMProviderName;
  readonly kind: ModelKind;
  /** Context window in tokens, when the backend is known to report it. */
  readonly contextWindow?: number;
}

export interface LLMProvider {
  readonly name: LLMProviderName;

  /** @throws {ProviderError} on transport failure, a non-2xx status or an unexpected body */
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse>;

  /**
   * Yields answer text as it arrives; used for the synthesizer and generators
   * when the CLI renders answers live.
   *
   * @throws {ProviderError} on transport failure or a non-2xx status
   */
  stream(messages: ChatMessage[], options?: ChatOptions): AsyncIterable<ChatChunk>;

  /** @throws {ProviderError} if the backend cannot be reached */
  listModels(): Promise<ModelInfo[]>;

  /** Reachability and credential check for the doctor command. Never throws. */
  validateConnection(): Promise<boolean>;
}
