/**
 * Shared command plumbing: config loading and top-level error reporting.
 *
 * Dependency direction: project.ts → config manager, orchestrator, logger
 * Used by: every command that needs a configured project
 */

import { configExists, loadConfig } from '../../core/config/manager.js';
import type { AppConfig } from '../../core/config/types.js';
import { formatUserFacingError } from '../../core/workflow/orchestrator.js';
import { logger } from '../../utils/logger.js';

/**
 * Load the project's config, exiting with a hint when there is none.
 */
export function requireConfig(projectRoot: string): AppConfig {
    if (!configExists(projectRoot)) {
        logger.error('No configuration found. Run "studymate init" first.');
        process.exit(1);
    }
    return loadConfig(projectRoot);
}

/** Print the failure the way the user should see it and exit 1. */
export function exitWithError(err: unknown): never {
    logger.error(formatUserFacingError(err));
    process.exit(1);
}
