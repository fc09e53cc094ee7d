/**
 * Likely exam questions with mark weights and answer outlines.
 */

import { z } from 'zod';
import { TaskGenerator, contextBlock, type GenerationRequest, type GeneratorOptions } from './base.js';
import type { ImportantQuestionsMeta } from './types.js';
import type { LLMProvider } from '../../providers/types.js';
import { positiveInt } from '../../utils/validation.js';

const paramsSchema = z.object({
    numQuestions: positiveInt(50).default(10),
});

type ImportantQuestionsParams = z.output<typeof paramsSchema>;

export class ImportantQuestionsGenerator extends TaskGenerator<typeof paramsSchema, ImportantQuestionsMeta> {
    protected readonly paramsSchema = paramsSchema;

    constructor(provider: LLMProvider, options: GeneratorOptions) {
        super('important-questions', provider, options);
    }

    protected buildUserPrompt({ topic, context, params }: GenerationRequest<ImportantQuestionsParams>): string {
        return [
            `Based on the topic: ${topic}`,
            '',
            contextBlock(context, 'Use general knowledge on this topic.'),
            '',
            `Generate the ${params.numQuestions} MOST IMPORTANT questions that are likely to appear in exams.`,
        ].join('\n');
    }

    protected buildMetadata({ topic, params }: GenerationRequest<ImportantQuestionsParams>): ImportantQuestionsMeta {
        return { kind: 'important-questions', topic, numQuestions: params.numQuestions };
    }
}
