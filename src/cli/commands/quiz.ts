/**
 * `studymate quiz`: Generate a multiple-choice quiz on a topic.
 *
 * Dependency direction: quiz.ts → commander, orchestrator, config
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import { createStudyBuddy } from '../../core/workflow/orchestrator.js';
import { TokenTracker } from '../../core/workflow/token-tracker.js';
import type { TaskRequest } from '../../core/workflow/request-parser.js';
import { difficultySchema, positiveInt, parseOrThrow, type Difficulty } from '../../utils/validation.js';
import { answerQuestion } from '../utils/answer.js';
import { exitWithError, requireConfig } from '../utils/project.js';

export interface QuizRequest {
    /** Recorded as the question and used to retrieve context. */
    question: string;
    task: Extract<TaskRequest, { branch: 'quiz' }>;
}

/** The topic is passed to the generator exactly as typed. */
export function buildQuizRequest(topic: string, numQuestions?: number, difficulty?: Difficulty): QuizRequest {
    const trimmed = topic.trim();
    return {
        question: `Quiz on ${trimmed}`,
        task: { branch: 'quiz', topic: trimmed, numQuestions, difficulty },
    };
}

export const quizCommand = new Command('quiz')
    .description('Generate a quiz on a topic from your study materials')
    .argument('<topic>', 'Quiz topic')
    .option('-n, --num-questions <n>', 'Number of questions', (v) => Number.parseInt(v, 10))
    .option('-d, --difficulty <level>', 'easy, medium or hard')
    .option('--no-stream', 'Print the quiz only when it is complete')
    .action(async (topic: string, options: { numQuestions?: number; difficulty?: string; stream: boolean }) => {
        const projectRoot = process.cwd();
        const config = requireConfig(projectRoot);
        const tracker = new TokenTracker();

        try {
            const count =
                options.numQuestions !== undefined
                    ? parseOrThrow(positiveInt(50), options.numQuestions, 'number of questions')
                    : undefined;
            const difficulty =
                options.difficulty !== undefined
                    ? parseOrThrow(difficultySchema, options.difficulty.toLowerCase(), 'difficulty')
                    : undefined;

            const buddy = createStudyBuddy(config, projectRoot, { tracker });
            const { question, task } = buildQuizRequest(topic, count, difficulty);
            await answerQuestion(buddy, question, { task, stream: options.stream });
            tracker.printSummary();
        } catch (err) {
            exitWithError(err);
        }
    });
