/**
 * Persisted vector index: `manifest.json` plus one JSON record per line in
 * `index.jsonl`, queried by brute-force cosine similarity.
 *
 * Dependency direction: vector-index.ts → knowledge/types, utils/fs, core/errors
 * Used by: knowledge base, context provider
 */

import { join } from 'node:path';
import type { IndexManifest, IndexRecord } from './types.js';
import { indexManifestSchema, indexRecordSchema } from './types.js';
import {
    appendTextFile,
    fileExists,
    readJsonFile,
    readTextFile,
    removePath,
    writeJsonFile,
    writeTextFile,
} from '../utils/fs.js';
import { KnowledgeStoreError, errorMessage } from '../core/errors.js';
import { logger } from '../utils/logger.js';

export const MANIFEST_FILE = 'manifest.json';
export const RECORDS_FILE = 'index.jsonl';

export interface ScoredRecord {
    record: IndexRecord;
    score: number;
    /** 1-based position in the result. */
    rank: number;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    let dot = 0;
    let normA = 0;
    let normB = 0;
    const length = Math.min(a.length, b.length);

    for (let i = 0; i < length; i++) {
        const x = a[i] ?? 0;
        const y = b[i] ?? 0;
        dot += x * y;
        normA += x * x;
        normB += y * y;
    }
    return dot / (Math.sqrt(normA) * Math.sqrt(normB) + 1e-8);
}

function assertCompatible(manifest: IndexManifest, embeddingModel: string, dimensions: number, action: string): void {
    if (manifest.embeddingModel === embeddingModel && manifest.dimensions === dimensions) return;
    throw new KnowledgeStoreError(
        `Vector index was built with ${manifest.embeddingModel} (${manifest.dimensions} dims); ` +
            `cannot ${action} ${embeddingModel} (${dimensions} dims) vectors. Clear the index and re-ingest.`,
        { existing: manifest, embeddingModel, dimensions },
    );
}

export class VectorIndex {
    private readonly manifestPath: string;
    private readonly recordsPath: string;

    constructor(
        public readonly dir: string,
        private readonly clock: () => Date = () => new Date(),
    ) {
        this.manifestPath = join(dir, MANIFEST_FILE);
        this.recordsPath = join(dir, RECORDS_FILE);
    }

    /** Whether an index has been created. */
    exists(): boolean {
        return fileExists(this.manifestPath);
    }

    /**
     * @throws {KnowledgeStoreError} if the manifest is missing or invalid
     */
    readManifest(): IndexManifest {
        let raw: unknown;
        try {
            raw = readJsonFile(this.manifestPath);
        } catch (err) {
            throw new KnowledgeStoreError(`Cannot read vector index manifest: ${errorMessage(err)}`, {
                path: this.manifestPath,
            });
        }

        const parsed = indexManifestSchema.safeParse(raw);
        if (!parsed.success) {
            throw new KnowledgeStoreError('Vector index manifest is invalid. Run "studymate docs clear-index" and re-ingest.', {
                path: this.manifestPath,
                issues: parsed.error.issues,
            });
        }
        return parsed.data;
    }

    /**
     * Read every record. An index without a records file is empty.
     *
     * @throws {KnowledgeStoreError} on a corrupt line
     */
    readRecords(): IndexRecord[] {
        if (!fileExists(this.recordsPath)) return [];

        const records: IndexRecord[] = [];
        const lines = readTextFile(this.recordsPath).split('\n');

        lines.forEach((line, lineIndex) => {
            if (!line.trim()) return;

            let raw: unknown;
            try {
                raw = JSON.parse(line);
            } catch (err) {
                throw new KnowledgeStoreError(`Corrupt vector index at line ${lineIndex + 1}: ${errorMessage(err)}`, {
                    path: this.recordsPath,
                });
            }

            const parsed = indexRecordSchema.safeParse(raw);
            if (!parsed.success) {
                throw new KnowledgeStoreError(`Invalid vector index record at line ${lineIndex + 1}`, {
                    path: this.recordsPath,
                    issues: parsed.error.issues,
                });
            }
            records.push(parsed.data);
        });

        return records;
    }

    /**
     * Append records, creating the index on first use.
     *
     * @throws {KnowledgeStoreError} if the records disagree with the index's
     *   embedding model or dimensions
     */
    append(records: readonly IndexRecord[], embeddingModel: string): void {
        const first = records[0];
        if (!first) return;

        const dimensions = first.embedding.length;
        const mismatched = records.find((r) => r.embedding.length !== dimensions);
        if (mismatched) {
            throw new KnowledgeStoreError(`Embedding for ${mismatched.id} has ${mismatched.embedding.length} dimensions, expected ${dimensions}`, {
                id: mismatched.id,
            });
        }

        const now = this.clock().toISOString();
        let manifest: IndexManifest;

        if (this.exists()) {
            const existing = this.readManifest();
            assertCompatible(existing, embeddingModel, dimensions, 'add');
            manifest = { ...existing, updatedAt: now };
        } else {
            manifest = { version: 1, embeddingModel, dimensions, createdAt: now, updatedAt: now };
        }

        try {
            appendTextFile(this.recordsPath, records.map((r) => JSON.stringify(r)).join('\n') + '\n');
            writeJsonFile(this.manifestPath, manifest);
        } catch (err) {
            throw new KnowledgeStoreError(`Failed to write vector index: ${errorMessage(err)}`, { dir: this.dir });
        }

        logger.debug(`Appended ${records.length} records to ${this.recordsPath}`);
    }

    /**
     * Top-k records by descending cosine similarity. Ties keep insertion order.
     *
     * @throws {KnowledgeStoreError} if the query vector comes from another
     *   embedding model or has other dimensions than the index
     */
    query(embedding: readonly number[], k: number, embeddingModel: string): ScoredRecord[] {
        if (!this.exists() || k < 1) return [];

        assertCompatible(this.readManifest(), embeddingModel, embedding.length, 'search with');

        return this.readRecords()
            .map((record) => ({ record, score: cosineSimilarity(embedding, record.embedding) }))
            .sort((a, b) => b.score - a.score)
            .slice(0, k)
            .map((entry, i) => ({ ...entry, rank: i + 1 }));
    }

    /**
     * Drop every record from one source document.
     *
     * @returns the number of records removed
     */
    removeSource(source: string): number {
        if (!this.exists()) return 0;

        const records = this.readRecords();
        const kept = records.filter((r) => r.metadata.source !== source);
        const removed = records.length - kept.length;

        if (removed > 0) {
            try {
                writeTextFile(this.recordsPath, kept.map((r) => `${JSON.stringify(r)}\n`).join(''));
                writeJsonFile(this.manifestPath, { ...this.readManifest(), updatedAt: this.clock().toISOString() });
            } catch (err) {
                throw new KnowledgeStoreError(`Failed to rewrite vector index: ${errorMessage(err)}`, { dir: this.dir });
            }
        }
        return removed;
    }

    /** Delete the whole index directory. */
    clear(): void {
        removePath(this.dir);
    }

    size(): number {
        return this.readRecords().length;
    }
}
