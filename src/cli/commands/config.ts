/**
 * `studymate config`: View configuration.
 *
 * API keys are masked in the printed output.
 *
 * Dependency direction: config.ts → commander, config module
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigPath } from '../../core/config/manager.js';
import type { AppConfig } from '../../core/config/types.js';
import { logger } from '../../utils/logger.js';
import { requireConfig } from '../utils/project.js';

/** Keep the last four characters of a secret. */
export function maskSecret(value: string): string {
    return value.length <= 4 ? '****' : `****${value.slice(-4)}`;
}

/** A copy of the config with every API key masked. */
export function redactConfig(config: AppConfig): AppConfig {
    const { anthropic, openai } = config.providers;
    return {
        ...config,
        providers: {
            ...config.providers,
            ...(anthropic ? { anthropic: { ...anthropic, apiKey: maskSecret(anthropic.apiKey) } } : {}),
            ...(openai ? { openai: { ...openai, apiKey: maskSecret(openai.apiKey) } } : {}),
        },
        search: {
            ...config.search,
            ...(config.search.apiKey ? { apiKey: maskSecret(config.search.apiKey) } : {}),
        },
    };
}

export const configCommand = new Command('config')
    .description('View the current configuration')
    .option('-p, --path', 'Show config file path only')
    .action((options: { path?: boolean }) => {
        const projectRoot = process.cwd();
        const config = requireConfig(projectRoot);

        if (options.path) {
            console.log(getConfigPath(projectRoot));
            return;
        }

        logger.header('Current Configuration');
        console.log(chalk.gray(`File: ${getConfigPath(projectRoot)}`));
        console.log();
        console.log(JSON.stringify(redactConfig(config), null, 2));
    });
