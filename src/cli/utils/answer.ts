/**
 * Runs one question with a spinner, live streaming and the result printout.
 *
 * Dependency direction: answer.ts → orchestrator, stream-renderer, ora
 * Used by: ask, chat, quiz and plan commands
 */

import ora from 'ora';
import type { StudyBuddy, ToolResult } from '../../core/workflow/orchestrator.js';
import type { StudySession } from '../../core/workflow/session.js';
import type { TaskRequest } from '../../core/workflow/request-parser.js';
import { BRANCH_LABELS } from '../../agents/types.js';
import { createStreamRenderer, printResult } from './stream-renderer.js';

export interface AnswerOptions {
    session?: StudySession;
    /** Skip routing and run this task with its own parameters. */
    task?: TaskRequest;
    stream: boolean;
}

/**
 * Ask the question and print the answer.
 *
 * @throws whatever the orchestrator throws; the spinner is stopped first
 */
export async function answerQuestion(
    buddy: StudyBuddy,
    question: string,
    options: AnswerOptions,
): Promise<ToolResult> {
    const spinner = ora('Thinking...').start();
    const renderer = createStreamRenderer();

    const stream = options.stream
        ? {
              onChunk: (text: string) => {
                  if (spinner.isSpinning) spinner.stop();
                  renderer.callbacks.onChunk?.(text);
              },
              onComplete: (text: string) => renderer.callbacks.onComplete?.(text),
          }
        : undefined;

    try {
        const result = await buddy.query(question, {
            session: options.session,
            task: options.task,
            stream,
            onStateChange: (ctx) => {
                if (spinner.isSpinning && ctx.branch && ctx.state === ctx.branch) {
                    spinner.text = `${BRANCH_LABELS[ctx.branch]}...`;
                }
            },
        });
        spinner.stop();
        printResult(result, renderer.streamed());
        return result;
    } catch (err) {
        spinner.stop();
        throw err;
    }
}
