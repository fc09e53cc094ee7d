/**
 * Multiple-choice quiz with an embedded answer key.
 */

import { z } from 'zod';
import { TaskGenerator, contextBlock, type GenerationRequest, type GeneratorOptions } from './base.js';
import type { QuizMeta } from './types.js';
import type { LLMProvider } from '../../providers/types.js';
import { difficultySchema, positiveInt } from '../../utils/validation.js';

const paramsSchema = z.object({
    numQuestions: positiveInt(50).default(5),
    difficulty: difficultySchema.default('medium'),
});

type QuizParams = z.output<typeof paramsSchema>;

export class QuizGenerator extends TaskGenerator<typeof paramsSchema, QuizMeta> {
    protected readonly paramsSchema = paramsSchema;

    constructor(provider: LLMProvider, options: GeneratorOptions) {
        super('quiz', provider, options);
    }

    protected buildUserPrompt({ topic, context, params }: GenerationRequest<QuizParams>): string {
        return [
            `Generate a quiz on the topic: ${topic}`,
            '',
            `NUMBER OF QUESTIONS: ${params.numQuestions}`,
            `DIFFICULTY LEVEL: ${params.difficulty}`,
            '',
            contextBlock(context, 'Use general knowledge on this topic.'),
            '',
            `Generate ${params.numQuestions} high-quality questions now:`,
        ].join('\n');
    }

    protected buildMetadata({ topic, params }: GenerationRequest<QuizParams>): QuizMeta {
        return { kind: 'quiz', topic, numQuestions: params.numQuestions, difficulty: params.difficulty };
    }
}
