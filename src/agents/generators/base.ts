/**
 * Task generator base: validated parameters in, one model call, verbatim text out.
 *
 * Dependency direction: generators/base.ts → agents/base, utils/validation, zod
 * Used by: the six generator implementations
 */

import type { z } from 'zod';
import { BaseAgent, type AgentOptions } from '../base.js';
import type { GeneratorBranch, StreamCallbacks } from '../types.js';
import type { LLMProvider } from '../../providers/types.js';
import type { TaskMetadata, TaskResult } from './types.js';
import { parseOrThrow } from '../../utils/validation.js';

/** What a generator builds its prompt and metadata from. */
export interface GenerationRequest<TParams> {
    topic: string;
    /** Retrieved study material; may be empty. */
    context: string;
    params: TParams;
}

export interface GeneratorOptions extends AgentOptions {
    /** Source of "now" for timestamps and date arithmetic. */
    clock?: () => Date;
}

export abstract class TaskGenerator<
    TSchema extends z.ZodTypeAny,
    TMeta extends TaskMetadata,
> extends BaseAgent<GenerationRequest<z.output<TSchema>>> {
    protected readonly clock: () => Date;
    protected abstract readonly paramsSchema: TSchema;

    constructor(branch: GeneratorBranch, provider: LLMProvider, options: GeneratorOptions) {
        super(branch, provider, options);
        this.clock = options.clock ?? (() => new Date());
    }

    /**
     * Generate the task output for a topic.
     *
     * @throws {ValidationError} if params fail validation
     * @throws {ProviderError} if the model call fails
     */
    async generate(
        topic: string,
        context: string,
        params: z.input<TSchema>,
        callbacks?: StreamCallbacks,
    ): Promise<TaskResult<TMeta>> {
        const request: GenerationRequest<z.output<TSchema>> = {
            topic: topic.trim(),
            context: context.trim(),
            params: parseOrThrow(this.paramsSchema, params, `${this.role} parameters`),
        };

        const output = await this.execute(request, callbacks);

        return {
            text: output.content,
            generatedAt: this.clock().toISOString(),
            tokensUsed: output.tokensUsed,
            metadata: this.buildMetadata(request),
        };
    }

    protected abstract buildMetadata(request: GenerationRequest<z.output<TSchema>>): TMeta;
}

/** The context block, or the generator's fallback line when nothing was retrieved. */
export function contextBlock(context: string, fallback: string): string {
    return `CONTEXT FROM STUDY MATERIALS:\n${context || fallback}`;
}
