/**
 * Configuration manager: load, save, validate, and merge configs.
 *
 * Dependency direction: manager.ts → schema.ts, defaults.ts, utils/fs.ts, errors.ts
 * Used by: CLI commands, study assistant factory
 */

import { isAbsolute, join, resolve } from 'node:path';
import type { ZodIssue } from 'zod';
import { appConfigSchema } from './schema.js';
import { CONFIG_DIR_NAME, CONFIG_FILE_NAME, DEFAULT_CONFIG } from './defaults.js';
import type { AppConfig } from './types.js';
import { fileExists, readJsonFile, writeJsonFile, ensureDir } from '../../utils/fs.js';
import { ConfigError } from '../errors.js';
import { logger } from '../../utils/logger.js';

/** Environment variables consulted when the config file leaves a secret unset. */
export type ConfigEnvironment = Readonly<Record<string, string | undefined>>;

export function getConfigDir(projectRoot: string): string {
    return join(resolve(projectRoot), CONFIG_DIR_NAME);
}

export function getConfigPath(projectRoot: string): string {
    return join(getConfigDir(projectRoot), CONFIG_FILE_NAME);
}

export function configExists(projectRoot: string): boolean {
    return fileExists(getConfigPath(projectRoot));
}

/**
 * Resolve a configured directory (documents, index) against the project root.
 */
export function resolveProjectPath(projectRoot: string, configured: string): string {
    return isAbsolute(configured) ? configured : resolve(projectRoot, configured);
}

function formatIssues(issues: readonly ZodIssue[]): string {
    return issues.map((i) => `  - ${i.path.join('.')}: ${i.message}`).join('\n');
}

/**
 * Load and validate the configuration from disk.
 *
 * @param projectRoot - The root directory of the project (where .studymate/ lives)
 * @param env - Source for secrets missing from the file (TAVILY_API_KEY)
 * @throws {ConfigError} if the file doesn't exist, is invalid JSON, or fails validation
 */
export function loadConfig(projectRoot: string, env: ConfigEnvironment = process.env): AppConfig {
    const configPath = getConfigPath(projectRoot);

    if (!fileExists(configPath)) {
        throw new ConfigError(
            `No configuration found. Run "studymate init" first.`,
            { configPath, projectRoot },
        );
    }

    logger.debug(`Loading config from ${configPath}`);

    const raw = readJsonFile(configPath);
    const result = appConfigSchema.safeParse(raw);

    if (!result.success) {
        throw new ConfigError(
            `Invalid configuration file:\n${formatIssues(result.error.issues)}`,
            { configPath, issues: result.error.issues },
        );
    }

    logger.debug('Config loaded and validated successfully');
    return applyEnvironment(result.data, env);
}

/**
 * Fill secrets the config file leaves unset from the environment.
 * Values in the file always win.
 */
export function applyEnvironment(config: AppConfig, env: ConfigEnvironment): AppConfig {
    const tavilyKey = env.TAVILY_API_KEY?.trim();
    if (!config.search.apiKey && tavilyKey) {
        return { ...config, search: { ...config.search, apiKey: tavilyKey } };
    }
    return config;
}

/**
 * Save configuration to disk, validating before write.
 *
 * @throws {ConfigError} if validation fails or write fails
 */
export function saveConfig(projectRoot: string, config: AppConfig): void {
    const result = appConfigSchema.safeParse(config);

    if (!result.success) {
        throw new ConfigError(
            `Cannot save invalid configuration:\n${formatIssues(result.error.issues)}`,
            { issues: result.error.issues },
        );
    }

    ensureDir(getConfigDir(projectRoot));
    writeJsonFile(getConfigPath(projectRoot), result.data);
    logger.debug(`Config saved to ${getConfigPath(projectRoot)}`);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two plain objects. Source values override target values.
 * Arrays are replaced, not concatenated; undefined source values are skipped.
 */
export function mergeConfig(
    target: Record<string, unknown>,
    source: Record<string, unknown>,
): Record<string, unknown> {
    const result: Record<string, unknown> = { ...target };

    for (const [key, sourceVal] of Object.entries(source)) {
        const targetVal = result[key];

        if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
            result[key] = mergeConfig(targetVal, sourceVal);
        } else if (sourceVal !== undefined) {
            result[key] = sourceVal;
        }
    }

    return result;
}

/** Per-section partial of the config, as accepted by getDefaultConfig. */
export type ConfigOverrides = {
    [K in keyof AppConfig]?: AppConfig[K] extends readonly unknown[]
        ? AppConfig[K]
        : AppConfig[K] extends object
            ? { [P in keyof AppConfig[K]]?: AppConfig[K][P] }
            : AppConfig[K];
};

/**
 * Get the default configuration with optional overrides merged in.
 *
 * @throws {ConfigError} if the merged result is not a valid config
 */
export function getDefaultConfig(overrides?: ConfigOverrides): AppConfig {
    const merged = overrides ? mergeConfig(DEFAULT_CONFIG, overrides) : DEFAULT_CONFIG;
    const result = appConfigSchema.safeParse(structuredClone(merged));

    if (!result.success) {
        throw new ConfigError(
            `Invalid configuration overrides:\n${formatIssues(result.error.issues)}`,
            { issues: result.error.issues },
        );
    }

    return result.data;
}
