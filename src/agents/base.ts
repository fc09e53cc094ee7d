/**
 * Agent base class: shared request/response handling for every model-backed step.
 *
 * The router, the synthesizer and the six task generators extend this base and
 * supply their user prompt. The system prompt comes from the prompt library.
 *
 * Dependency direction: agents/base.ts → providers/types, core/errors, prompts, utils
 * Used by: router, synthesizer, task generators
 */

import type { LLMProvider, ChatMessage, ChatOptions, TokenUsage } from '../providers/types.js';
import type { ModelRole, StreamCallbacks } from './types.js';
import { MODEL_ROLE_LABELS } from './types.js';
import { AppError, ProviderError, errorMessage } from '../core/errors.js';
import { getDefaultPrompt } from '../prompts/library.js';
import { logger } from '../utils/logger.js';

/** Model settings for one agent. */
export interface AgentOptions {
    model: string;
    temperature?: number;
    maxTokens?: number;
    /** Overrides the built-in system prompt for the role. */
    systemPrompt?: string;
    /** Called after every completed model call. */
    onUsage?: UsageListener;
}

export type UsageListener = (role: ModelRole, model: string, usage: TokenUsage) => void;

/** Output that an agent produces after one model call. */
export interface AgentOutput {
    /** The generated text, verbatim. */
    content: string;
    /** Which step produced this output. */
    role: ModelRole;
    /** The model that answered. */
    model: string;
    /** Total tokens for the call (estimated when streamed). */
    tokensUsed: number;
    usage: TokenUsage;
}

/** Rough token estimate used when a stream carries no usage data. */
export function estimateTokens(text: string): number {
    return Math.ceil(text.length / 4);
}

/**
 * Base class for all model-backed steps.
 *
 * To create a new agent:
 * 1. Extend this class with its input type
 * 2. Implement `buildUserPrompt(input)`
 * 3. Optionally override `buildSystemPrompt()`
 */
export abstract class BaseAgent<TInput> {
    public readonly role: ModelRole;
    protected readonly provider: LLMProvider;
    protected readonly model: string;
    protected readonly temperature: number;
    protected readonly maxTokens: number;
    private readonly systemPrompt: string;
    private readonly onUsage?: UsageListener;

    constructor(role: ModelRole, provider: LLMProvider, options: AgentOptions) {
        this.role = role;
        this.provider = provider;
        this.model = options.model;
        this.temperature = options.temperature ?? 0.3;
        this.maxTokens = options.maxTokens ?? 4096;
        this.systemPrompt = options.systemPrompt ?? getDefaultPrompt(role);
        this.onUsage = options.onUsage;
    }

    /**
     * Run one model call for `input`.
     *
     * Streams when `callbacks.onChunk` is given, falling back to a single
     * non-streaming call if the stream fails before producing any text.
     *
     * @throws {ProviderError} if the model call fails
     */
    async execute(input: TInput, callbacks?: StreamCallbacks): Promise<AgentOutput> {
        if (callbacks?.onChunk) {
            return this.executeStreaming(input, callbacks);
        }

        const label = MODEL_ROLE_LABELS[this.role];
        logger.debug(`${label} starting...`);

        try {
            const response = await this.provider.chat(this.buildMessages(input), this.buildOptions());

            logger.debug(`${label} complete (${response.usage.totalTokens} tokens)`);
            this.onUsage?.(this.role, response.model, response.usage);
            callbacks?.onComplete?.(response.content);

            return {
                content: response.content,
                role: this.role,
                model: response.model,
                tokensUsed: response.usage.totalTokens,
                usage: response.usage,
            };
        } catch (err) {
            throw this.wrapError(err);
        }
    }

    /**
     * Execute with streaming output.
     *
     * Uses the provider's stream() method and calls callbacks for each chunk.
     * Falls back to a non-streaming call if streaming fails before any text arrived.
     */
    async executeStreaming(input: TInput, callbacks: StreamCallbacks): Promise<AgentOutput> {
        const label = MODEL_ROLE_LABELS[this.role];
        logger.debug(`${label} starting (streaming)...`);

        const messages = this.buildMessages(input);
        let accumulated = '';

        try {
            for await (const chunk of this.provider.stream(messages, this.buildOptions())) {
                if (chunk.content) {
                    accumulated += chunk.content;
                    callbacks.onChunk?.(chunk.content);
                }
            }
        } catch (err) {
            if (accumulated) {
                throw this.wrapError(err);
            }
            logger.warn(`${label} streaming failed, falling back to non-streaming`);
            logger.debug(`Stream error: ${errorMessage(err)}`);
            return this.execute(input, { onComplete: callbacks.onComplete });
        }

        callbacks.onComplete?.(accumulated);

        const promptTokens = estimateTokens(messages.map((m) => m.content).join('') + this.systemPrompt);
        const completionTokens = estimateTokens(accumulated);
        const usage: TokenUsage = { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
        this.onUsage?.(this.role, this.model, usage);

        logger.debug(`${label} complete (~${completionTokens} completion tokens)`);

        return {
            content: accumulated,
            role: this.role,
            model: this.model,
            tokensUsed: usage.totalTokens,
            usage,
        };
    }

    /** The system prompt that defines this step's role and output format. */
    protected buildSystemPrompt(): string {
        return this.systemPrompt;
    }

    /** Build the user prompt from the input. */
    protected abstract buildUserPrompt(input: TInput): string;

    private buildMessages(input: TInput): ChatMessage[] {
        return [{ role: 'user', content: this.buildUserPrompt(input) }];
    }

    private buildOptions(): ChatOptions {
        return {
            model: this.model,
            temperature: this.temperature,
            maxTokens: this.maxTokens,
            systemPrompt: this.buildSystemPrompt(),
        };
    }

    private wrapError(err: unknown): AppError {
        if (err instanceof AppError) return err;
        return new ProviderError(`${MODEL_ROLE_LABELS[this.role]} failed: ${errorMessage(err)}`, {
            role: this.role,
            model: this.model,
        });
    }
}
