/**
 * File system helpers with consistent error handling.
 *
 * Dependency direction: fs.ts → node:fs, node:path, errors.ts
 * Used by: config manager, prompt library, knowledge store, sessions
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { ConfigError, errorMessage } from '../core/errors.js';

/**
 * Read a JSON file and parse it. The result is `unknown`: callers validate it.
 * @throws {ConfigError} if the file doesn't exist or contains invalid JSON.
 */
export function readJsonFile(filePath: string): unknown {
    const absolutePath = resolve(filePath);

    if (!existsSync(absolutePath)) {
        throw new ConfigError(`File not found: ${absolutePath}`, { filePath: absolutePath });
    }

    try {
        const parsed: unknown = JSON.parse(readFileSync(absolutePath, 'utf-8'));
        return parsed;
    } catch (err) {
        throw new ConfigError(`Failed to parse JSON file: ${absolutePath}`, {
            filePath: absolutePath,
            originalError: errorMessage(err),
        });
    }
}

/**
 * Write data to a JSON file, creating parent directories if needed.
 * @throws {ConfigError} if the write fails.
 */
export function writeJsonFile(filePath: string, data: unknown): void {
    writeTextFile(filePath, JSON.stringify(data, null, 2) + '\n');
}

/**
 * Write a text file, creating parent directories if needed.
 * @throws {ConfigError} if the write fails.
 */
export function writeTextFile(filePath: string, content: string): void {
    const absolutePath = resolve(filePath);

    try {
        ensureDir(dirname(absolutePath));
        writeFileSync(absolutePath, content, 'utf-8');
    } catch (err) {
        throw new ConfigError(`Failed to write file: ${absolutePath}`, {
            filePath: absolutePath,
            originalError: errorMessage(err),
        });
    }
}

/**
 * Append to a text file, creating it and its parent directories if needed.
 * @throws {ConfigError} if the write fails.
 */
export function appendTextFile(filePath: string, content: string): void {
    const absolutePath = resolve(filePath);

    try {
        ensureDir(dirname(absolutePath));
        appendFileSync(absolutePath, content, 'utf-8');
    } catch (err) {
        throw new ConfigError(`Failed to append to file: ${absolutePath}`, {
            filePath: absolutePath,
            originalError: errorMessage(err),
        });
    }
}

/**
 * Ensure a directory exists, creating it recursively if needed.
 */
export function ensureDir(dirPath: string): void {
    const absolutePath = resolve(dirPath);
    if (!existsSync(absolutePath)) {
        mkdirSync(absolutePath, { recursive: true });
    }
}

export function fileExists(filePath: string): boolean {
    return existsSync(resolve(filePath));
}

/**
 * Read a text file and return its contents.
 * @throws {ConfigError} if the file doesn't exist.
 */
export function readTextFile(filePath: string): string {
    const absolutePath = resolve(filePath);

    if (!existsSync(absolutePath)) {
        throw new ConfigError(`File not found: ${absolutePath}`, { filePath: absolutePath });
    }

    return readFileSync(absolutePath, 'utf-8');
}

/** Delete a file or directory tree. Missing paths are ignored. */
export function removePath(targetPath: string): void {
    rmSync(resolve(targetPath), { recursive: true, force: true });
}
