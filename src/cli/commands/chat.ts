/**
 * `studymate chat`: Interactive study session.
 *
 * Slash commands: /history, /clear, /exam-date <YYYY-MM-DD>, /save, /exit.
 *
 * Dependency direction: chat.ts → commander, prompts, orchestrator, session
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import prompts from 'prompts';
import chalk from 'chalk';
import { createStudyBuddy, formatUserFacingError, type StudyBuddy } from '../../core/workflow/orchestrator.js';
import { TokenTracker } from '../../core/workflow/token-tracker.js';
import { StudySession, listSessions, loadSession, saveSession } from '../../core/workflow/session.js';
import { BRANCH_LABELS } from '../../agents/types.js';
import { isoDateString } from '../../utils/validation.js';
import { logger } from '../../utils/logger.js';
import { answerQuestion } from '../utils/answer.js';
import { exitWithError, requireConfig } from '../utils/project.js';

const HELP = [
    '/history            show this session\'s questions and answers',
    '/clear              forget the conversation',
    '/exam-date <date>   set the exam date for study plans (YYYY-MM-DD)',
    '/save               save the session to resume later',
    '/exit               leave',
];

function printHistory(session: StudySession): void {
    if (session.messages.length === 0) {
        logger.info('No messages yet.');
        return;
    }
    for (const message of session.messages) {
        const who = message.role === 'user' ? chalk.bold('You') : chalk.cyan(message.toolUsed ? BRANCH_LABELS[message.toolUsed] : 'Assistant');
        const preview = message.content.length > 200 ? `${message.content.slice(0, 200)}…` : message.content;
        console.log(`${who}: ${preview}`);
    }
}

/**
 * Handle a slash command.
 *
 * @returns false when the session should end
 */
function handleCommand(input: string, session: StudySession, projectRoot: string): boolean {
    const [command, ...args] = input.split(/\s+/);

    switch (command) {
        case '/exit':
        case '/quit':
            return false;
        case '/history':
            printHistory(session);
            return true;
        case '/clear':
            session.clear();
            logger.success('Conversation cleared');
            return true;
        case '/save':
            saveSession(projectRoot, session);
            logger.success(`Session saved — resume with "studymate chat --resume ${session.id}"`);
            return true;
        case '/exam-date': {
            const parsed = isoDateString.safeParse(args[0] ?? '');
            if (!parsed.success) {
                logger.warn('Usage: /exam-date YYYY-MM-DD');
                return true;
            }
            session.examDate = parsed.data;
            logger.success(`Exam date set to ${parsed.data}`);
            return true;
        }
        default:
            console.log(chalk.gray(HELP.map((line) => `  ${line}`).join('\n')));
            return true;
    }
}

async function loop(buddy: StudyBuddy, session: StudySession, projectRoot: string, stream: boolean): Promise<void> {
    for (;;) {
        const { input } = await prompts({ type: 'text', name: 'input', message: 'You' });

        // Ctrl+C / Ctrl+D
        if (typeof input !== 'string') return;

        const question = input.trim();
        if (!question) continue;

        if (question.startsWith('/')) {
            if (!handleCommand(question, session, projectRoot)) return;
            continue;
        }

        try {
            await answerQuestion(buddy, question, { session, stream });
        } catch (err) {
            logger.error(formatUserFacingError(err));
        }
    }
}

export const chatCommand = new Command('chat')
    .description('Start an interactive study session')
    .option('-r, --resume <id>', 'Resume a saved session')
    .option('-e, --exam-date <date>', 'Exam date for study plans (YYYY-MM-DD)')
    .option('-l, --list', 'List saved sessions and exit')
    .option('--no-stream', 'Print answers only when they are complete')
    .action(async (options: { resume?: string; examDate?: string; list?: boolean; stream: boolean }) => {
        const projectRoot = process.cwd();

        if (options.list) {
            const sessions = listSessions(projectRoot);
            logger.header('Saved Sessions');
            if (sessions.length === 0) logger.info('No saved sessions.');
            for (const s of sessions) {
                console.log(`  ${chalk.bold(s.id)} ${chalk.gray(`${s.messages.length} message(s), updated ${s.updatedAt}`)}`);
            }
            return;
        }

        const config = requireConfig(projectRoot);
        const tracker = new TokenTracker();

        try {
            if (options.examDate !== undefined && !isoDateString.safeParse(options.examDate).success) {
                logger.error('--exam-date must be in YYYY-MM-DD format');
                process.exit(1);
            }

            let session: StudySession;
            if (options.resume) {
                const loaded = loadSession(projectRoot, options.resume);
                if (!loaded) {
                    logger.error(`No saved session "${options.resume}". See "studymate chat --list".`);
                    process.exit(1);
                }
                session = loaded;
                logger.info(`Resumed session ${session.id} (${session.messages.length} message(s))`);
            } else {
                session = new StudySession();
            }
            if (options.examDate) session.examDate = options.examDate;

            const buddy = createStudyBuddy(config, projectRoot, { tracker });

            logger.header('Study Assistant');
            console.log(chalk.gray('  Ask anything about your notes, or request a quiz, flashcards, a study plan…'));
            console.log(chalk.gray('  Type /help for commands.'));
            console.log();

            await loop(buddy, session, projectRoot, options.stream);
            tracker.printSummary();
        } catch (err) {
            exitWithError(err);
        }
    });
