#!/usr/bin/env node

/**
 * CLI entry point: registers all commands with Commander.js.
 *
 * Dependency direction: cli/index.ts → commander, all command files
 * Used by: package.json bin entry ("studymate" binary)
 */

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { configCommand } from './commands/config.js';
import { doctorCommand } from './commands/doctor.js';
import { ingestCommand } from './commands/ingest.js';
import { docsCommand } from './commands/docs.js';
import { askCommand } from './commands/ask.js';
import { chatCommand } from './commands/chat.js';
import { quizCommand } from './commands/quiz.js';
import { planCommand } from './commands/plan.js';
import { LogLevel, logger } from '../utils/logger.js';
import { exitWithError } from './utils/project.js';

const program = new Command();

program
    .name('studymate')
    .description('Study assistant — answers from your notes or the web, and builds quizzes, flashcards and study plans')
    .version('0.1.0')
    .option('-v, --verbose', 'Show debug output')
    .option('-q, --quiet', 'Only show warnings and errors')
    .hook('preAction', (thisCommand) => {
        const opts = thisCommand.opts<{ verbose?: boolean; quiet?: boolean }>();
        const fromEnv = logger.parseLogLevel(process.env.STUDYMATE_LOG_LEVEL);

        if (opts.verbose) logger.setLogLevel(LogLevel.Debug);
        else if (opts.quiet) logger.setLogLevel(LogLevel.Warn);
        else if (fromEnv !== undefined) logger.setLogLevel(fromEnv);
    });

// Register commands
program.addCommand(initCommand);
program.addCommand(configCommand);
program.addCommand(doctorCommand);
program.addCommand(ingestCommand);
program.addCommand(docsCommand);
program.addCommand(askCommand);
program.addCommand(chatCommand);
program.addCommand(quizCommand);
program.addCommand(planCommand);

program.parseAsync().catch(exitWithError);
