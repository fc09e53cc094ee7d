/**
 * Question queue: answers several questions in sequence.
 *
 * Processes them one by one, tracking results and continuing on failure
 * unless asked to stop.
 *
 * Dependency direction: question-queue.ts → orchestrator, session, utils
 * Used by: cli/commands/ask.ts (batch mode)
 */

import chalk from 'chalk';
import type { StudyBuddy, ToolResult } from './orchestrator.js';
import type { StudySession } from './session.js';
import { BRANCH_LABELS } from '../../agents/types.js';
import { errorMessage } from '../errors.js';
import { logger } from '../../utils/logger.js';

/** A question in the queue with its result. */
export interface QueuedQuestion {
    question: string;
    status: 'pending' | 'running' | 'completed' | 'failed' | 'skipped';
    result?: ToolResult;
    error?: string;
    /** Duration in milliseconds. */
    duration?: number;
}

export interface QuestionQueueOptions {
    buddy: Pick<StudyBuddy, 'query'>;
    questions: readonly string[];
    /** Stop at the first failure and mark the rest skipped. */
    stopOnFailure?: boolean;
    session?: StudySession;
    /** Called after each question finishes, successfully or not. */
    onResult?: (item: QueuedQuestion, index: number) => void;
    clock?: () => number;
}

/**
 * Answer every question in order and return the queue with all results.
 */
export async function runQuestionQueue(options: QuestionQueueOptions): Promise<QueuedQuestion[]> {
    const { buddy, questions, stopOnFailure = false, session, onResult, clock = Date.now } = options;

    const queue: QueuedQuestion[] = questions.map((question) => ({ question, status: 'pending' }));

    logger.header('Study Assistant — Question Queue');
    logger.info(`${queue.length} question(s) queued`);

    for (const [i, item] of queue.entries()) {
        logger.debug(`Question ${i + 1}/${queue.length}: ${item.question}`);
        item.status = 'running';
        const startTime = clock();

        try {
            item.result = await buddy.query(item.question, { session });
            item.status = 'completed';
        } catch (err) {
            item.status = 'failed';
            item.error = errorMessage(err);
        }
        item.duration = clock() - startTime;
        onResult?.(item, i);

        if (item.status === 'failed' && stopOnFailure) {
            for (const rest of queue.slice(i + 1)) {
                rest.status = 'skipped';
            }
            break;
        }
    }

    return queue;
}

/**
 * Parse a question list from a file or string.
 * Each line is a separate question. Empty lines and comments (#) are skipped.
 */
export function parseQuestions(input: string): string[] {
    return input
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/** Counts per status. */
export function summarizeQueue(queue: readonly QueuedQuestion[]): Record<'completed' | 'failed' | 'skipped', number> {
    return {
        completed: queue.filter((q) => q.status === 'completed').length,
        failed: queue.filter((q) => q.status === 'failed').length,
        skipped: queue.filter((q) => q.status === 'skipped').length,
    };
}

/** Print a colored summary of the queue results. */
export function printQueueSummary(queue: readonly QueuedQuestion[]): void {
    console.log();
    logger.header('Queue Summary');

    for (const item of queue) {
        const icon = item.status === 'completed' ? chalk.green('✔')
            : item.status === 'failed' ? chalk.red('✘')
                : item.status === 'skipped' ? chalk.gray('○')
                    : chalk.yellow('…');

        const tool = item.result ? chalk.cyan(` [${BRANCH_LABELS[item.result.toolUsed]}]`) : '';
        const duration = item.duration !== undefined ? chalk.gray(` (${(item.duration / 1000).toFixed(1)}s)`) : '';
        console.log(`  ${icon} ${item.question}${tool}${duration}`);

        if (item.error) {
            console.log(chalk.red(`    Error: ${item.error}`));
        }
    }

    const { completed, failed, skipped } = summarizeQueue(queue);
    console.log();
    console.log(chalk.bold(`  ${completed} completed, ${failed} failed, ${skipped} skipped`));
}
