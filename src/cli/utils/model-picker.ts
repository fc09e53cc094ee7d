/**
 * Model selection for the init wizard.
 *
 * The chat steps (default, router, synthesizer, generators) are offered only
 * the provider's chat models; the embeddings step only its embedding models.
 * When the list cannot be fetched, or holds nothing of the wanted kind, the
 * user types a model ID instead.
 *
 * Dependency direction: model-picker.ts → providers/registry, providers/metadata, prompts, ora
 * Used by: cli/commands/init.ts
 */

import prompts from 'prompts';
import ora from 'ora';
import type { LLMProviderName, ModelInfo, ModelKind } from '../../providers/types.js';
import type { ProviderConfig } from '../../core/config/types.js';
import { createProvider, clearProviderCache } from '../../providers/registry.js';
import { PROVIDER_DEFAULT_MODELS } from '../../providers/metadata.js';
import { errorMessage } from '../../core/errors.js';
import { logger } from '../../utils/logger.js';

/** Above this many choices the picker switches from select to autocomplete. */
const SELECT_THRESHOLD = 20;

export interface PickModelOptions {
    /** Defaults to `chat`. */
    readonly kind?: ModelKind;
    /** Preselected model; defaults to the provider's default chat model. */
    readonly defaultModel?: string;
}

export interface ModelChoices {
    readonly choices: prompts.Choice[];
    /** Index of the preselected choice. */
    readonly initial: number;
}

/**
 * Choices for the models of one kind, sorted by ID, with the default
 * preselected when it is listed.
 */
export function buildModelChoices(models: readonly ModelInfo[], kind: ModelKind, defaultModel: string): ModelChoices {
    const choices = models
        .filter((m) => m.kind === kind)
        .sort((a, b) => a.id.localeCompare(b.id))
        .map((m) => ({
            title: m.contextWindow ? `${m.id} (${formatContextWindow(m.contextWindow)})` : m.id,
            value: m.id,
        }));

    const defaultIndex = choices.findIndex((c) => c.value === defaultModel);
    return { choices, initial: defaultIndex >= 0 ? defaultIndex : 0 };
}

/**
 * Let the user pick a model of the given kind from the provider's live list.
 *
 * @returns The chosen model ID, or null if the user cancelled
 */
export async function pickModel(
    providerName: LLMProviderName,
    providerConfig: ProviderConfig,
    message: string,
    options: PickModelOptions = {},
): Promise<string | null> {
    const kind = options.kind ?? 'chat';
    const defaultModel = options.defaultModel ?? PROVIDER_DEFAULT_MODELS[providerName];

    // Fresh provider with the config entered so far
    clearProviderCache();

    const spinner = ora(`Fetching ${providerName} models...`).start();
    let models: ModelInfo[];
    try {
        models = await createProvider(providerName, providerConfig).listModels();
        spinner.stop();
    } catch (err) {
        spinner.stop();
        logger.debug(`Could not list ${providerName} models: ${errorMessage(err)}`);
        return await fallbackTextInput(`${message} (could not fetch model list)`, defaultModel);
    }

    const { choices, initial } = buildModelChoices(models, kind, defaultModel);
    if (choices.length === 0) {
        return await fallbackTextInput(`${message} (no ${kind} models listed)`, defaultModel);
    }

    if (choices.length <= SELECT_THRESHOLD) {
        const { model } = await prompts({ type: 'select', name: 'model', message, choices, initial });
        return typeof model === 'string' ? model : null;
    }

    const { model } = await prompts({
        type: 'autocomplete',
        name: 'model',
        message,
        choices,
        initial: defaultModel,
        suggest: (input: string, all: prompts.Choice[]) => {
            const lower = input.toLowerCase();
            return Promise.resolve(all.filter((c) => c.title.toLowerCase().includes(lower)));
        },
    });
    return typeof model === 'string' ? model : null;
}

async function fallbackTextInput(message: string, defaultModel: string): Promise<string | null> {
    const { model } = await prompts({ type: 'text', name: 'model', message, initial: defaultModel });
    return typeof model === 'string' && model.trim() ? model.trim() : null;
}

export function formatContextWindow(tokens: number): string {
    if (tokens >= 1_000_000) return `${(tokens / 1_000_000).toFixed(1)}M ctx`;
    if (tokens >= 1_000) return `${Math.round(tokens / 1_000)}K ctx`;
    return `${tokens} ctx`;
}
