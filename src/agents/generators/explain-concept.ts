/**
 * Layered concept explanation, from ELI5 to exam tip.
 */

import { z } from 'zod';
import { TaskGenerator, contextBlock, type GenerationRequest, type GeneratorOptions } from './base.js';
import type { ExplainConceptMeta } from './types.js';
import type { LLMProvider } from '../../providers/types.js';
import { difficultySchema } from '../../utils/validation.js';

const paramsSchema = z.object({
    difficulty: difficultySchema.default('medium'),
});

type ExplainParams = z.output<typeof paramsSchema>;

export class ExplainConceptGenerator extends TaskGenerator<typeof paramsSchema, ExplainConceptMeta> {
    protected readonly paramsSchema = paramsSchema;

    constructor(provider: LLMProvider, options: GeneratorOptions) {
        super('explain-concept', provider, options);
    }

    protected buildUserPrompt({ topic, context, params }: GenerationRequest<ExplainParams>): string {
        return [
            `Explain the following concept in detail: ${topic}`,
            '',
            `DIFFICULTY LEVEL: ${params.difficulty}`,
            '',
            contextBlock(context, 'No specific context. Provide a comprehensive explanation.'),
            '',
            'Provide the explanation now:',
        ].join('\n');
    }

    protected buildMetadata({ topic, params }: GenerationRequest<ExplainParams>): ExplainConceptMeta {
        return { kind: 'explain-concept', concept: topic, difficulty: params.difficulty };
    }
}
