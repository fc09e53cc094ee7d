/**
 * `studymate init`: Interactive setup wizard.
 *
 * Walks the user through configuring providers, models, embeddings and web
 * search. Generates `.studymate/config.json` and the editable prompt files
 * in the current project directory.
 *
 * Dependency direction: init.ts → commander, prompts, ora, chalk, config module
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import prompts from 'prompts';
import chalk from 'chalk';
import ora from 'ora';
import { configExists, saveConfig, getDefaultConfig, getConfigPath } from '../../core/config/manager.js';
import type { AppConfig, ModelsConfig } from '../../core/config/types.js';
import type { LLMProviderName } from '../../providers/types.js';
import { getSupportedProviders } from '../../providers/registry.js';
import { EMBEDDING_DEFAULT_MODELS, PROVIDER_DESCRIPTIONS, PROVIDER_LABELS } from '../../providers/metadata.js';
import { generateDefaultPrompts } from '../../prompts/library.js';
import { apiKeyFormat } from '../../utils/validation.js';
import { logger } from '../../utils/logger.js';
import { pickModel } from '../utils/model-picker.js';

const TOTAL_STEPS = 5;

const MODEL_STEP_LABELS: Record<keyof ModelsConfig, string> = {
    router: 'Router (picks the tool)',
    synthesizer: 'Synthesizer (answers from documents/web)',
    generators: 'Generators (quizzes, plans, flashcards, …)',
};

export const initCommand = new Command('init')
    .description('Set up the study assistant in the current directory')
    .option('-f, --force', 'Overwrite existing configuration')
    .option('-y, --yes', 'Accept defaults without prompting')
    .action(async (options: { force?: boolean; yes?: boolean }) => {
        const projectRoot = process.cwd();

        logger.header('Study Assistant — Setup');

        if (configExists(projectRoot) && !options.force) {
            const { overwrite } = await prompts({
                type: 'confirm',
                name: 'overwrite',
                message: 'Configuration already exists. Overwrite?',
                initial: false,
            });

            if (overwrite !== true) {
                logger.info('Setup cancelled.');
                return;
            }
        }

        const config = options.yes ? getDefaultConfig() : await runWizard();

        if (!config) {
            logger.info('Setup cancelled.');
            return;
        }

        const spinner = ora('Saving configuration...').start();
        saveConfig(projectRoot, config);
        const created = generateDefaultPrompts(projectRoot);
        spinner.succeed(`Configuration saved to ${getConfigPath(projectRoot)}`);
        if (created.length > 0) {
            logger.debug(`Wrote ${created.length} prompt file(s)`);
        }

        console.log();
        logger.success('Setup complete!');
        console.log(chalk.gray('  Next steps:'));
        console.log(chalk.gray('  1. Run "studymate doctor" to verify providers'));
        console.log(chalk.gray('  2. Run "studymate ingest <files...>" to add your notes (PDF, TXT, MD)'));
        console.log(chalk.gray('  3. Run "studymate chat" or "studymate ask <question>"'));
        console.log(chalk.gray('  Prompts can be edited in .studymate/prompts/'));
        console.log();
    });

function selectedProviders(value: unknown): LLMProviderName[] {
    if (!Array.isArray(value)) return [];
    return getSupportedProviders().filter((p) => value.includes(p));
}

function asProviderName(value: unknown): LLMProviderName | undefined {
    return getSupportedProviders().find((p) => p === value);
}

function validateKey(value: string): true | string {
    const result = apiKeyFormat.safeParse(value);
    return result.success || (result.error.issues[0]?.message ?? 'Invalid API key');
}

/**
 * Run the interactive setup wizard.
 *
 * @returns the config to save, or null when the user cancelled
 */
async function runWizard(): Promise<AppConfig | null> {
    const config = getDefaultConfig();

    // ── Step 1: Provider Selection ──
    logger.step(1, TOTAL_STEPS, 'LLM Providers');
    const providerAnswers = await prompts({
        type: 'multiselect',
        name: 'providers',
        message: 'Select LLM providers to configure (space to toggle, enter to confirm):',
        choices: getSupportedProviders().map((p) => ({
            title: PROVIDER_DESCRIPTIONS[p],
            value: p,
            selected: p === 'ollama',
        })),
        min: 1,
    });

    const providers = selectedProviders(providerAnswers.providers);
    if (providers.length === 0) return null;

    // ── Step 2: Provider Configuration ──
    logger.step(2, TOTAL_STEPS, 'Provider Settings');
    config.providers = {};

    if (providers.includes('anthropic')) {
        const { apiKey } = await prompts({
            type: 'password',
            name: 'apiKey',
            message: 'Anthropic API key:',
            validate: validateKey,
        });
        if (typeof apiKey !== 'string') return null;

        config.providers.anthropic = { apiKey: apiKey.trim(), baseUrl: 'https://api.anthropic.com', apiVersion: '2023-06-01' };
    }

    if (providers.includes('openai')) {
        const answers = await prompts([
            {
                type: 'text',
                name: 'baseUrl',
                message: 'OpenAI-compatible base URL (https://api.groq.com/openai for Groq):',
                initial: 'https://api.openai.com',
            },
            {
                type: 'password',
                name: 'apiKey',
                message: 'API key:',
                validate: validateKey,
            },
        ]);
        if (typeof answers.apiKey !== 'string') return null;

        config.providers.openai = {
            apiKey: answers.apiKey.trim(),
            baseUrl: typeof answers.baseUrl === 'string' && answers.baseUrl ? answers.baseUrl : 'https://api.openai.com',
        };
    }

    if (providers.includes('ollama')) {
        const { baseUrl } = await prompts({
            type: 'text',
            name: 'baseUrl',
            message: 'Ollama base URL:',
            initial: 'http://localhost:11434',
        });

        config.providers.ollama = {
            baseUrl: typeof baseUrl === 'string' && baseUrl ? baseUrl : 'http://localhost:11434',
        };
    }

    // ── Step 3: Model Assignment ──
    logger.step(3, TOTAL_STEPS, 'Model Assignment');

    let defaultProvider = providers[0];
    if (providers.length > 1) {
        const { preferred } = await prompts({
            type: 'select',
            name: 'preferred',
            message: 'Which provider should answer by default?',
            choices: providers.map((p) => ({ title: PROVIDER_LABELS[p], value: p })),
        });
        defaultProvider = asProviderName(preferred);
    }
    if (!defaultProvider) return null;

    const defaultModel = await pickModel(defaultProvider, config.providers, 'Default model:');
    if (!defaultModel) return null;

    console.log(chalk.gray(`  Default: ${defaultProvider} / ${defaultModel}`));

    const { customize } = await prompts({
        type: 'confirm',
        name: 'customize',
        message: 'Choose a different model for the router, synthesizer or generators?',
        initial: false,
    });

    for (const step of ['router', 'synthesizer', 'generators'] as const) {
        let provider: LLMProviderName = defaultProvider;
        let model = defaultModel;

        if (customize === true) {
            const { stepProvider } = await prompts({
                type: 'select',
                name: 'stepProvider',
                message: `${MODEL_STEP_LABELS[step]} — provider:`,
                choices: providers.map((p) => ({ title: PROVIDER_LABELS[p], value: p })),
                initial: providers.indexOf(defaultProvider),
            });
            const chosen = asProviderName(stepProvider);
            if (!chosen) return null;

            const chosenModel = await pickModel(chosen, config.providers, `${MODEL_STEP_LABELS[step]} — model:`);
            if (!chosenModel) return null;

            provider = chosen;
            model = chosenModel;
        }

        config.models[step] = { ...config.models[step], provider, model };
    }

    // ── Step 4: Embeddings ──
    logger.step(4, TOTAL_STEPS, 'Embeddings');
    const embeddingProviders = providers.filter((p): p is 'ollama' | 'openai' => p === 'ollama' || p === 'openai');

    if (embeddingProviders.length === 0) {
        logger.warn('Anthropic has no embedding API; documents will be embedded with a local Ollama model.');
        config.providers.ollama = { baseUrl: 'http://localhost:11434' };
        config.embeddings = { provider: 'ollama', model: EMBEDDING_DEFAULT_MODELS.ollama };
    } else {
        const { embeddingProvider } = await prompts({
            type: 'select',
            name: 'embeddingProvider',
            message: 'Embedding provider:',
            choices: embeddingProviders.map((p) => ({ title: PROVIDER_LABELS[p], value: p })),
        });
        const chosen = embeddingProviders.find((p) => p === embeddingProvider);
        if (!chosen) return null;

        const embeddingModel = await pickModel(chosen, config.providers, 'Embedding model:', {
            kind: 'embedding',
            defaultModel: EMBEDDING_DEFAULT_MODELS[chosen],
        });
        if (!embeddingModel) return null;

        config.embeddings = { provider: chosen, model: embeddingModel };
    }

    // ── Step 5: Web Search and Study Defaults ──
    logger.step(5, TOTAL_STEPS, 'Web Search & Study Defaults');
    console.log(chalk.gray('  Web search uses Tavily. Leave the key blank to use TAVILY_API_KEY instead.'));

    const studyAnswers = await prompts([
        {
            type: 'password',
            name: 'tavilyKey',
            message: 'Tavily API key (optional):',
        },
        {
            type: 'number',
            name: 'hoursPerDay',
            message: 'Study hours per day for study plans:',
            initial: config.study.hoursPerDay,
            min: 0.5,
            max: 24,
            float: true,
            increment: 0.5,
        },
    ]);

    if (typeof studyAnswers.tavilyKey === 'string' && studyAnswers.tavilyKey.trim()) {
        config.search = { ...config.search, apiKey: studyAnswers.tavilyKey.trim() };
    }
    if (typeof studyAnswers.hoursPerDay === 'number') {
        config.study = { ...config.study, hoursPerDay: studyAnswers.hoursPerDay };
    }

    return config;
}
