/**
 * Common validators for user input and data.
 *
 * Dependency direction: validation.ts → zod, core/errors
 * Used by: CLI commands, config schema, task generators
 */

import { z } from 'zod';
import { ValidationError } from '../core/errors.js';

/** Validate that a string is a non-empty trimmed string. */
export const nonEmptyString = z.string().trim().min(1, 'Value cannot be empty');

/** Validate a URL string. */
export const urlString = z.string().url('Must be a valid URL');

/**
 * Validate that an API key looks reasonable (non-empty, no whitespace).
 * Does NOT validate against the provider: just basic format.
 */
export const apiKeyFormat = z
    .string()
    .trim()
    .min(8, 'API key seems too short')
    .refine((val) => !/\s/.test(val), 'API key must not contain whitespace');

/**
 * Validate a model name string (alphanumeric, hyphens, colons, dots, slashes).
 * Examples: "llama-3.3-70b-versatile", "llama3.2:latest", "gpt-4o-mini"
 */
export const modelName = z
    .string()
    .trim()
    .min(1, 'Model name cannot be empty')
    .regex(
        /^[a-zA-Z0-9][a-zA-Z0-9\-_.:/]*$/,
        'Model name must start with alphanumeric and contain only alphanumeric, hyphens, underscores, dots, colons, or slashes',
    );

/** Difficulty levels shared by the quiz and explanation generators. */
export const difficultySchema = z.enum(['easy', 'medium', 'hard']);
export type Difficulty = z.infer<typeof difficultySchema>;

/** Calendar date in `YYYY-MM-DD` form (format only; calendar validity is checked separately). */
export const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format');

/**
 * Validate a positive integer within a reasonable range.
 */
export function positiveInt(max: number = 100): z.ZodNumber {
    return z.number().int().min(1).max(max);
}

/**
 * Parse `value` with `schema`, converting failures into a ValidationError
 * whose message lists every issue.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.output<S> {
    const result = schema.safeParse(value);
    if (!result.success) {
        const issues = result.error.issues
            .map((i) => `${i.path.length > 0 ? i.path.join('.') : label}: ${i.message}`)
            .join('; ');
        throw new ValidationError(`Invalid ${label}: ${issues}`, { issues: result.error.issues });
    }
    return result.data;
}
