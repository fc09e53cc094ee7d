/**
 * `studymate doctor`: Health check for providers and setup.
 *
 * Verifies that the providers the config actually uses can connect, that
 * the embedding model answers, and reports the knowledge base status.
 *
 * Dependency direction: doctor.ts → commander, ora, chalk, config module, registries
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { configExists, loadConfig } from '../../core/config/manager.js';
import type { AppConfig } from '../../core/config/types.js';
import type { LLMProviderName } from '../../providers/types.js';
import { validateProviders } from '../../providers/registry.js';
import { createEmbeddingProvider } from '../../providers/embeddings/registry.js';
import { PROVIDER_LABELS } from '../../providers/metadata.js';
import { createKnowledgeBase } from '../../core/workflow/orchestrator.js';
import { errorMessage } from '../../core/errors.js';
import { logger } from '../../utils/logger.js';

/** Providers referenced by the router, synthesizer and generators. */
export function providersInUse(config: AppConfig): LLMProviderName[] {
    const { router, synthesizer, generators } = config.models;
    return [...new Set([router.provider, synthesizer.provider, generators.provider])];
}

export const doctorCommand = new Command('doctor')
    .description('Check project setup and provider health')
    .action(async () => {
        const projectRoot = process.cwd();

        logger.header('Study Assistant — Health Check');

        const configCheck = configExists(projectRoot);
        console.log(
            configCheck
                ? chalk.green('  ✔ Configuration file found')
                : chalk.red('  ✘ No configuration file — run "studymate init"'),
        );
        if (!configCheck) {
            process.exit(1);
        }

        let config: AppConfig;
        try {
            config = loadConfig(projectRoot);
        } catch (err) {
            console.log(chalk.red(`  ✘ ${errorMessage(err)}`));
            process.exit(1);
        }
        console.log(chalk.green('  ✔ Configuration is valid'));

        let allHealthy = true;

        // Chat providers
        console.log();
        logger.info('Checking provider connections...');
        const spinner = ora('Testing providers...').start();
        const results = await validateProviders(providersInUse(config), config.providers);
        spinner.stop();

        for (const name of providersInUse(config)) {
            if (results[name]) {
                console.log(chalk.green(`  ✔ ${PROVIDER_LABELS[name]} — connected`));
            } else {
                console.log(chalk.red(`  ✘ ${PROVIDER_LABELS[name]} — connection failed`));
                allHealthy = false;
            }
        }

        // Embeddings
        const embedSpinner = ora('Testing embedding model...').start();
        try {
            const embedder = createEmbeddingProvider(config.embeddings, config.providers);
            const ok = await embedder.validateConnection();
            embedSpinner.stop();
            if (ok) {
                console.log(chalk.green(`  ✔ Embeddings (${embedder.name} / ${embedder.model}) — ready`));
            } else {
                console.log(chalk.red(`  ✘ Embeddings (${embedder.name} / ${embedder.model}) — not reachable`));
                allHealthy = false;
            }
        } catch (err) {
            embedSpinner.stop();
            console.log(chalk.red(`  ✘ Embeddings — ${errorMessage(err)}`));
            allHealthy = false;
        }

        // Web search
        console.log(
            config.search.apiKey
                ? chalk.green('  ✔ Web search key configured')
                : chalk.yellow('  ! No Tavily API key — web search questions will find nothing'),
        );

        // Knowledge base
        try {
            const kb = createKnowledgeBase(config, projectRoot);
            const documents = kb.listDocuments().length;
            const chunks = kb.index.exists() ? kb.index.size() : 0;
            const line = `  ${documents} document(s), ${chunks} indexed chunk(s) in ${kb.documentsDir}`;
            console.log(documents > 0 && chunks > 0 ? chalk.green(line) : chalk.yellow(`${line} — run "studymate ingest"`));
        } catch (err) {
            console.log(chalk.red(`  ✘ Knowledge base — ${errorMessage(err)}`));
            allHealthy = false;
        }

        console.log();
        if (allHealthy) {
            logger.success('All checks passed! You\'re ready to study.');
        } else {
            logger.warn('Some checks failed. Review the output above.');
            process.exitCode = 1;
        }
    });
