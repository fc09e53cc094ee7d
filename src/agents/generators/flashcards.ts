/**
 * Flashcard deck with front, back and a memory hint per card.
 */

import { z } from 'zod';
import { TaskGenerator, contextBlock, type GenerationRequest, type GeneratorOptions } from './base.js';
import type { FlashcardsMeta } from './types.js';
import type { LLMProvider } from '../../providers/types.js';
import { positiveInt } from '../../utils/validation.js';

const paramsSchema = z.object({
    numCards: positiveInt(100).default(10),
});

type FlashcardParams = z.output<typeof paramsSchema>;

export class FlashcardsGenerator extends TaskGenerator<typeof paramsSchema, FlashcardsMeta> {
    protected readonly paramsSchema = paramsSchema;

    constructor(provider: LLMProvider, options: GeneratorOptions) {
        super('flashcards', provider, options);
    }

    protected buildUserPrompt({ topic, context, params }: GenerationRequest<FlashcardParams>): string {
        return [
            `Create ${params.numCards} flashcards for the topic: ${topic}`,
            '',
            contextBlock(context, 'Use general knowledge on this topic.'),
            '',
            `Generate ${params.numCards} flashcards now:`,
        ].join('\n');
    }

    protected buildMetadata({ topic, params }: GenerationRequest<FlashcardParams>): FlashcardsMeta {
        return { kind: 'flashcards', topic, numCards: params.numCards };
    }
}
