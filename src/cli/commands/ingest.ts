/**
 * `studymate ingest`: Add study materials to the knowledge base.
 *
 * Dependency direction: ingest.ts → commander, ora, orchestrator factory
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import { createKnowledgeBase } from '../../core/workflow/orchestrator.js';
import { logger } from '../../utils/logger.js';
import { exitWithError, requireConfig } from '../utils/project.js';

export const ingestCommand = new Command('ingest')
    .description('Add PDF, TXT or MD files to the knowledge base')
    .argument('<files...>', 'Files to add')
    .option('-s, --subject <subject>', 'Subject to tag the documents with')
    .action(async (files: string[], options: { subject?: string }) => {
        const projectRoot = process.cwd();
        const config = requireConfig(projectRoot);

        const spinner = ora(`Ingesting ${files.length} file(s)...`).start();
        try {
            const kb = createKnowledgeBase(config, projectRoot);
            const summary = await kb.ingest(files, options.subject ?? config.knowledge.defaultSubject);
            spinner.stop();

            if (summary.documents === 0) {
                logger.warn('No documents found to ingest.');
                process.exitCode = 1;
                return;
            }

            logger.success(`Indexed ${summary.chunks} chunk(s) from ${summary.documents} document(s)`);
            for (const file of summary.files) {
                console.log(chalk.gray(`  - ${file}`));
            }
        } catch (err) {
            spinner.fail('Ingestion failed');
            exitWithError(err);
        }
    });
