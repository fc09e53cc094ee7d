/**
 * Structured 16-mark exam answer.
 */

import { z } from 'zod';
import { TaskGenerator, contextBlock, type GenerationRequest, type GeneratorOptions } from './base.js';
import type { LongFormAnswerMeta } from './types.js';
import type { LLMProvider } from '../../providers/types.js';

const paramsSchema = z.object({});

type LongFormParams = z.output<typeof paramsSchema>;

export class LongFormAnswerGenerator extends TaskGenerator<typeof paramsSchema, LongFormAnswerMeta> {
    protected readonly paramsSchema = paramsSchema;

    constructor(provider: LLMProvider, options: GeneratorOptions) {
        super('long-form-answer', provider, options);
    }

    protected buildUserPrompt({ topic, context }: GenerationRequest<LongFormParams>): string {
        return [
            'Generate a COMPREHENSIVE 16-mark answer for the following question.',
            '',
            `QUESTION: ${topic}`,
            '',
            contextBlock(context, 'No specific context provided. Use general knowledge.'),
            '',
            'Make it comprehensive enough to earn full 16 marks. Generate the answer now:',
        ].join('\n');
    }

    protected buildMetadata({ topic }: GenerationRequest<LongFormParams>): LongFormAnswerMeta {
        return { kind: 'long-form-answer', question: topic, marks: 16 };
    }
}
