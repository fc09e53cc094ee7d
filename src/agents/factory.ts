/**
 * Agent factory: creates the router, synthesizer and generators from config.
 *
 * Wires together the provider registry, the per-step model config and the
 * prompt library.
 *
 * Dependency direction: factory.ts → agents/*, providers/registry, prompts/library
 * Used by: study assistant factory
 */

import type { ModelRole } from './types.js';
import type { AppConfig, ModelRoleConfig } from '../core/config/types.js';
import type { GeneratorOptions } from './generators/base.js';
import type { UsageListener } from './base.js';
import { createProvider } from '../providers/registry.js';
import { loadRolePrompt } from '../prompts/library.js';
import { RouterAgent } from './router.js';
import { AnswerSynthesizer } from './synthesizer.js';
import { LongFormAnswerGenerator } from './generators/long-form-answer.js';
import { StudyPlanGenerator } from './generators/study-plan.js';
import { QuizGenerator } from './generators/quiz.js';
import { FlashcardsGenerator } from './generators/flashcards.js';
import { ExplainConceptGenerator } from './generators/explain-concept.js';
import { ImportantQuestionsGenerator } from './generators/important-questions.js';

/** One instance of every generator. */
export interface TaskGenerators {
    'long-form-answer': LongFormAnswerGenerator;
    'study-plan': StudyPlanGenerator;
    quiz: QuizGenerator;
    flashcards: FlashcardsGenerator;
    'explain-concept': ExplainConceptGenerator;
    'important-questions': ImportantQuestionsGenerator;
}

export interface Agents {
    router: RouterAgent;
    synthesizer: AnswerSynthesizer;
    generators: TaskGenerators;
}

/** The model config block that serves a role. */
export function modelConfigFor(role: ModelRole, config: AppConfig): ModelRoleConfig {
    if (role === 'router') return config.models.router;
    if (role === 'synthesizer') return config.models.synthesizer;
    return config.models.generators;
}

export interface CreateAgentsOptions {
    clock?: () => Date;
    onUsage?: UsageListener;
}

function optionsFor(
    role: ModelRole,
    config: AppConfig,
    projectRoot: string,
    extra: CreateAgentsOptions,
): GeneratorOptions {
    const roleConfig = modelConfigFor(role, config);
    return {
        model: roleConfig.model,
        temperature: roleConfig.temperature,
        maxTokens: roleConfig.maxTokens,
        systemPrompt: loadRolePrompt(projectRoot, role),
        clock: extra.clock,
        onUsage: extra.onUsage,
    };
}

/**
 * Create every agent for the configured models.
 *
 * @throws {ProviderError} if a step names a provider that is not configured
 */
export function createAgents(
    config: AppConfig,
    projectRoot: string,
    extra: CreateAgentsOptions = {},
): Agents {
    const providerFor = (role: ModelRole) =>
        createProvider(modelConfigFor(role, config).provider, config.providers);
    const opts = (role: ModelRole) => optionsFor(role, config, projectRoot, extra);

    return {
        router: new RouterAgent(providerFor('router'), opts('router')),
        synthesizer: new AnswerSynthesizer(providerFor('synthesizer'), opts('synthesizer')),
        generators: {
            'long-form-answer': new LongFormAnswerGenerator(providerFor('long-form-answer'), opts('long-form-answer')),
            'study-plan': new StudyPlanGenerator(providerFor('study-plan'), opts('study-plan')),
            quiz: new QuizGenerator(providerFor('quiz'), opts('quiz')),
            flashcards: new FlashcardsGenerator(providerFor('flashcards'), opts('flashcards')),
            'explain-concept': new ExplainConceptGenerator(providerFor('explain-concept'), opts('explain-concept')),
            'important-questions': new ImportantQuestionsGenerator(
                providerFor('important-questions'),
                opts('important-questions'),
            ),
        },
    };
}
