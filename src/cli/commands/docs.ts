/**
 * `studymate docs`: List and remove stored documents.
 *
 * Dependency direction: docs.ts → commander, prompts, orchestrator factory
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import prompts from 'prompts';
import { createKnowledgeBase } from '../../core/workflow/orchestrator.js';
import { logger } from '../../utils/logger.js';
import { exitWithError, requireConfig } from '../utils/project.js';

export function formatSize(bytes: number): string {
    if (bytes >= 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
    if (bytes >= 1024) return `${(bytes / 1024).toFixed(1)} KB`;
    return `${bytes} B`;
}

const listCommand = new Command('list')
    .description('List stored documents, newest first')
    .action(() => {
        const projectRoot = process.cwd();
        try {
            const kb = createKnowledgeBase(requireConfig(projectRoot), projectRoot);
            const documents = kb.listDocuments();

            logger.header('Knowledge Base');
            if (documents.length === 0) {
                logger.info('No documents yet. Run "studymate ingest <files...>".');
                return;
            }
            for (const doc of documents) {
                const modified = doc.modified.toISOString().slice(0, 16).replace('T', ' ');
                console.log(`  ${chalk.bold(doc.name)} ${chalk.gray(`${formatSize(doc.size)}, ${modified}`)}`);
            }
        } catch (err) {
            exitWithError(err);
        }
    });

const removeCommand = new Command('remove')
    .description('Delete a stored document and its indexed chunks')
    .argument('<name>', 'Document file name')
    .action((name: string) => {
        const projectRoot = process.cwd();
        try {
            const kb = createKnowledgeBase(requireConfig(projectRoot), projectRoot);
            if (!kb.deleteDocument(name)) {
                logger.error(`No stored document named "${name}"`);
                process.exitCode = 1;
                return;
            }
            logger.success(`Removed ${name}`);
        } catch (err) {
            exitWithError(err);
        }
    });

const clearIndexCommand = new Command('clear-index')
    .description('Delete the vector index (stored documents are kept)')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(async (options: { yes?: boolean }) => {
        const projectRoot = process.cwd();
        try {
            const kb = createKnowledgeBase(requireConfig(projectRoot), projectRoot);

            if (!options.yes) {
                const { confirmed } = await prompts({
                    type: 'confirm',
                    name: 'confirmed',
                    message: 'Delete the vector index? Documents must be re-ingested afterwards.',
                    initial: false,
                });
                if (confirmed !== true) {
                    logger.info('Cancelled.');
                    return;
                }
            }

            kb.clearIndex();
            logger.success('Vector index cleared');
        } catch (err) {
            exitWithError(err);
        }
    });

export const docsCommand = new Command('docs')
    .description('Manage stored study materials')
    .addCommand(listCommand)
    .addCommand(removeCommand)
    .addCommand(clearIndexCommand);
