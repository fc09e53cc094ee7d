/**
 * Text extraction for uploaded study material.
 *
 * Dependency direction: loaders.ts → pdf-parse, node:fs, knowledge/types
 * Used by: knowledge base
 */

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import pdfParse from 'pdf-parse/lib/pdf-parse.js';
import type { LoadedDocument } from './types.js';

/** Extensions the loaders can read. Anything else is skipped. */
export const SUPPORTED_EXTENSIONS: readonly string[] = ['.pdf', '.txt', '.md'];

export function isSupportedDocument(filePath: string): boolean {
    return SUPPORTED_EXTENSIONS.includes(extname(filePath).toLowerCase());
}

export async function extractText(filePath: string): Promise<string> {
    const buffer = await readFile(filePath);
    if (extname(filePath).toLowerCase() === '.pdf') {
        const parsed = await pdfParse(buffer);
        return parsed.text.trim();
    }
    return buffer.toString('utf-8');
}

/**
 * Load one document with its metadata.
 *
 * @returns undefined for unsupported file types
 * @throws when the file cannot be read or parsed
 */
export async function loadDocument(
    filePath: string,
    subject: string,
    uploadedAt: string,
): Promise<LoadedDocument | undefined> {
    if (!isSupportedDocument(filePath)) return undefined;

    const text = await extractText(filePath);
    return {
        text,
        metadata: { source: basename(filePath), subject, uploadedAt, filePath },
    };
}
