/**
 * Core error hierarchy for the study assistant.
 *
 * All errors extend AppError and carry a machine-readable code
 * plus optional structured context for debugging.
 *
 * Dependency direction: errors.ts → nothing (leaf module)
 * Used by: every layer in the application
 */

/** Base application error with structured metadata. */
export class AppError extends Error {
    public readonly code: string;
    public readonly context?: Record<string, unknown>;

    constructor(message: string, code: string, context?: Record<string, unknown>) {
        super(message);
        this.name = 'AppError';
        this.code = code;
        this.context = context;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/** Raised when configuration is missing, invalid, or cannot be loaded/saved. */
export class ConfigError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'CONFIG_ERROR', context);
        this.name = 'ConfigError';
    }
}

/** Raised when a language-model or embedding backend fails or cannot be reached. */
export class ProviderError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'PROVIDER_ERROR', context);
        this.name = 'ProviderError';
    }
}

/** Raised when a question cycle attempts an invalid state transition. */
export class WorkflowError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'WORKFLOW_ERROR', context);
        this.name = 'WorkflowError';
    }
}

/** Raised when user input fails validation. */
export class ValidationError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'VALIDATION_ERROR', context);
        this.name = 'ValidationError';
    }
}

/** Raised when the document store or vector index cannot be read or written. */
export class KnowledgeStoreError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'KNOWLEDGE_STORE_ERROR', context);
        this.name = 'KnowledgeStoreError';
    }
}

/** Raised by the web search client. The web lookup layer recovers from it. */
export class SearchError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'SEARCH_ERROR', context);
        this.name = 'SearchError';
    }
}

/** Render any thrown value as a message string. */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
