/**
 * Console logger with chalk colors and a process-wide level.
 *
 * Dependency direction: logger.ts → chalk (external only)
 * Used by: every layer for consistent logging output
 */

import chalk from 'chalk';

export enum LogLevel {
    Debug = 0,
    Info = 1,
    Warn = 2,
    Error = 3,
    Silent = 4,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
    debug: LogLevel.Debug,
    info: LogLevel.Info,
    warn: LogLevel.Warn,
    error: LogLevel.Error,
    silent: LogLevel.Silent,
};

let currentLevel: LogLevel = LogLevel.Info;

/** Set the global log level. */
export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

/** Get the current global log level. */
export function getLogLevel(): LogLevel {
    return currentLevel;
}

/**
 * Map a level name ("debug", "WARN", …) to a LogLevel.
 * Returns undefined for unknown or missing names.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
    if (!name) return undefined;
    return LEVEL_NAMES[name.trim().toLowerCase()];
}

export function debug(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Debug) {
        console.debug(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
}

export function info(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Info) {
        console.info(chalk.blue(`[INFO]  ${message}`), ...args);
    }
}

export function success(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Info) {
        console.info(chalk.green(`✔ ${message}`), ...args);
    }
}

export function warn(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Warn) {
        console.warn(chalk.yellow(`[WARN]  ${message}`), ...args);
    }
}

export function error(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Error) {
        console.error(chalk.red(`[ERROR] ${message}`), ...args);
    }
}

/** Log a numbered stage of a multi-step process (cyan). */
export function step(stepNumber: number, total: number, message: string): void {
    if (currentLevel <= LogLevel.Info) {
        console.info(chalk.cyan(`[${stepNumber}/${total}] ${message}`));
    }
}

export function blank(): void {
    if (currentLevel <= LogLevel.Info) {
        console.log();
    }
}

/** Bold title followed by a rule, capped at 60 columns. */
export function header(message: string): void {
    if (currentLevel <= LogLevel.Info) {
        console.log();
        console.log(chalk.bold.white(message));
        console.log(chalk.gray('─'.repeat(Math.min(message.length + 4, 60))));
    }
}

export const logger = {
    debug,
    info,
    success,
    warn,
    error,
    step,
    blank,
    header,
    setLogLevel,
    getLogLevel,
    parseLogLevel,
};
