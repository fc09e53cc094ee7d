/**
 * Answer rendering: streams the answering step's text live, then prints
 * what the answer was built from.
 *
 * Dependency direction: stream-renderer.ts → agents/types, orchestrator types, chalk
 * Used by: ask, chat, quiz and plan commands
 */

import chalk from 'chalk';
import type { StreamCallbacks } from '../../agents/types.js';
import type { TaskMetadata } from '../../agents/generators/types.js';
import type { ToolResult } from '../../core/workflow/orchestrator.js';
import { BRANCH_LABELS } from '../../agents/types.js';

/**
 * Create a streaming renderer that writes the answer as it arrives.
 *
 * @returns `callbacks` (pass as `stream` to query) and `streamed()`,
 *          true once any text was written
 */
export function createStreamRenderer(): {
    callbacks: StreamCallbacks;
    streamed: () => boolean;
} {
    let written = false;

    const callbacks: StreamCallbacks = {
        onChunk(text: string) {
            if (!written) {
                process.stdout.write('\n');
                written = true;
            }
            process.stdout.write(text);
        },
        onComplete() {
            if (written) {
                process.stdout.write('\n');
            }
        },
    };

    return { callbacks, streamed: () => written };
}

function describeMetadata(meta: TaskMetadata): string {
    switch (meta.kind) {
        case 'long-form-answer':
            return `${meta.marks}-mark answer`;
        case 'study-plan': {
            const adjusted = meta.examDateAdjusted ? ' (adjusted)' : '';
            return `exam ${meta.examDate}${adjusted}, ${meta.daysAvailable} days, ${meta.hoursPerDay}h/day, topics: ${meta.topics.join(', ')}`;
        }
        case 'quiz':
            return `${meta.numQuestions} ${meta.difficulty} questions on ${meta.topic}`;
        case 'flashcards':
            return `${meta.numCards} cards on ${meta.topic}`;
        case 'explain-concept':
            return `${meta.concept} (${meta.difficulty})`;
        case 'important-questions':
            return `${meta.numQuestions} questions on ${meta.topic}`;
    }
}

/** Unique source ids in first-seen order. */
export function uniqueSources(result: Pick<ToolResult, 'contextUsed'>): string[] {
    return [...new Set(result.contextUsed.map((c) => c.sourceId))];
}

/**
 * Print a result. The answer text is skipped when it was already streamed.
 */
export function printResult(result: ToolResult, alreadyStreamed: boolean): void {
    console.log();
    console.log(chalk.bold.cyan(BRANCH_LABELS[result.toolUsed]));

    if (!alreadyStreamed) {
        console.log();
        console.log(result.answerText);
    }

    if (result.taskMetadata) {
        console.log();
        console.log(chalk.gray(`  ${describeMetadata(result.taskMetadata)}`));
    }

    const sources = uniqueSources(result);
    if (sources.length > 0) {
        console.log();
        console.log(chalk.gray('  Sources:'));
        for (const source of sources) {
            console.log(chalk.gray(`  - ${source}`));
        }
    }
    console.log();
}
