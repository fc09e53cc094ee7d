/**
 * `studymate ask`: Answer one question, or a batch of questions from a file.
 *
 * Dependency direction: ask.ts → commander, orchestrator, question-queue, config
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import { readFileSync, existsSync } from 'node:fs';
import chalk from 'chalk';
import { createStudyBuddy } from '../../core/workflow/orchestrator.js';
import { TokenTracker } from '../../core/workflow/token-tracker.js';
import { parseQuestions, printQueueSummary, runQuestionQueue } from '../../core/workflow/question-queue.js';
import { BRANCH_LABELS } from '../../agents/types.js';
import { logger } from '../../utils/logger.js';
import { answerQuestion } from '../utils/answer.js';
import { exitWithError, requireConfig } from '../utils/project.js';

export const askCommand = new Command('ask')
    .description('Ask a question about your study materials')
    .argument('<question>', 'The question, or a path to a question list file with --batch')
    .option('--batch', 'Treat the argument as a question list file (one question per line)')
    .option('--stop-on-failure', 'Stop the batch at the first failed question')
    .option('--no-stream', 'Print the answer only when it is complete')
    .action(async (question: string, options: { batch?: boolean; stopOnFailure?: boolean; stream: boolean }) => {
        const projectRoot = process.cwd();
        const config = requireConfig(projectRoot);
        const tracker = new TokenTracker();

        try {
            const buddy = createStudyBuddy(config, projectRoot, { tracker });

            if (options.batch) {
                if (!existsSync(question)) {
                    logger.error(`Question list file not found: ${question}`);
                    process.exit(1);
                }

                const questions = parseQuestions(readFileSync(question, 'utf-8'));
                if (questions.length === 0) {
                    logger.error('No questions found in file. Each line should be one question.');
                    process.exit(1);
                }

                const results = await runQuestionQueue({
                    buddy,
                    questions,
                    stopOnFailure: options.stopOnFailure,
                    onResult: (item, index) => {
                        console.log(chalk.bold(`\n── Question ${index + 1}/${questions.length} ──`));
                        console.log(chalk.gray(item.question));
                        if (item.result) {
                            console.log(chalk.cyan(BRANCH_LABELS[item.result.toolUsed]));
                            console.log(item.result.answerText);
                        }
                    },
                });
                printQueueSummary(results);
                tracker.printSummary();

                if (results.some((r) => r.status === 'failed')) process.exitCode = 1;
                return;
            }

            await answerQuestion(buddy, question, { stream: options.stream });
            tracker.printSummary();
        } catch (err) {
            exitWithError(err);
        }
    });
