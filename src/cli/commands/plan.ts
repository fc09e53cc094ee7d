/**
 * `studymate plan`: Generate a day-by-day study plan up to the exam.
 *
 * Topics, exam date and hours go straight to the study-plan generator; the
 * command never phrases them as a question for the router to read back.
 *
 * Dependency direction: plan.ts → commander, orchestrator, request-parser, config
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import { writeFileSync } from 'node:fs';
import { createStudyBuddy } from '../../core/workflow/orchestrator.js';
import type { TaskRequest } from '../../core/workflow/request-parser.js';
import { TokenTracker } from '../../core/workflow/token-tracker.js';
import { logger } from '../../utils/logger.js';
import { answerQuestion } from '../utils/answer.js';
import { exitWithError, requireConfig } from '../utils/project.js';

export interface PlanRequest {
    /** Recorded as the question. */
    question: string;
    task: Extract<TaskRequest, { branch: 'study-plan' }>;
}

export function buildPlanRequest(topics: readonly string[], examDate?: string, hoursPerDay?: number): PlanRequest {
    const cleaned = topics.map((t) => t.trim()).filter((t) => t.length > 0);
    return {
        question: `Study plan for ${cleaned.join(', ')}`,
        task: { branch: 'study-plan', topics: cleaned, examDate, hoursPerDay },
    };
}

export const planCommand = new Command('plan')
    .description('Generate a study plan for the given topics')
    .argument('<topics...>', 'Topics to cover')
    .option('-e, --exam-date <date>', 'Exam date (YYYY-MM-DD); defaults to 30 days from today')
    .option('-H, --hours <hours>', 'Study hours per day', parseFloat)
    .option('-o, --output <file>', 'Also write the plan to a file')
    .option('--no-stream', 'Print the plan only when it is complete')
    .action(async (topics: string[], options: { examDate?: string; hours?: number; output?: string; stream: boolean }) => {
        const projectRoot = process.cwd();
        const config = requireConfig(projectRoot);
        const tracker = new TokenTracker();

        try {
            const buddy = createStudyBuddy(config, projectRoot, { tracker });
            const { question, task } = buildPlanRequest(topics, options.examDate, options.hours);

            const result = await answerQuestion(buddy, question, { task, stream: options.stream });

            if (options.output) {
                writeFileSync(options.output, result.answerText + '\n', 'utf-8');
                logger.success(`Plan written to ${options.output}`);
            }
            tracker.printSummary();
        } catch (err) {
            exitWithError(err);
        }
    });
