/**
 * Knowledge base: the documents directory plus the vector index built from it.
 *
 * Ingestion: save → load → chunk → embed in batches → append to the index.
 *
 * Dependency direction: knowledge-base.ts → loaders, chunker, vector-index, embeddings/types
 * Used by: ingest and docs commands, study assistant factory
 */

import { copyFileSync, readdirSync, statSync } from 'node:fs';
import { basename, join, resolve } from 'node:path';
import type { DocumentInfo, IndexRecord, LoadedDocument } from './types.js';
import type { VectorIndex } from './vector-index.js';
import type { EmbeddingProvider } from '../providers/embeddings/types.js';
import { loadDocument, isSupportedDocument } from './loaders.js';
import { splitText, DEFAULT_SEPARATORS } from './chunker.js';
import { ensureDir, fileExists, removePath } from '../utils/fs.js';
import { KnowledgeStoreError, errorMessage } from '../core/errors.js';
import { logger } from '../utils/logger.js';

export const EMBED_BATCH_SIZE = 32;

export interface KnowledgeBaseOptions {
    documentsDir: string;
    index: VectorIndex;
    embedder: EmbeddingProvider;
    chunkSize: number;
    chunkOverlap: number;
    defaultSubject: string;
    clock?: () => Date;
}

export interface IngestSummary {
    files: string[];
    documents: number;
    chunks: number;
    skipped: string[];
}

export class KnowledgeBase {
    readonly documentsDir: string;
    readonly index: VectorIndex;
    private readonly embedder: EmbeddingProvider;
    private readonly chunkSize: number;
    private readonly chunkOverlap: number;
    private readonly defaultSubject: string;
    private readonly clock: () => Date;

    constructor(options: KnowledgeBaseOptions) {
        this.documentsDir = resolve(options.documentsDir);
        this.index = options.index;
        this.embedder = options.embedder;
        this.chunkSize = options.chunkSize;
        this.chunkOverlap = options.chunkOverlap;
        this.defaultSubject = options.defaultSubject;
        this.clock = options.clock ?? (() => new Date());
    }

    /**
     * Copy files into the documents directory under their basenames.
     *
     * @returns the stored paths
     * @throws {KnowledgeStoreError} if a file is missing or cannot be copied
     */
    saveFiles(filePaths: readonly string[]): string[] {
        ensureDir(this.documentsDir);

        return filePaths.map((filePath) => {
            const source = resolve(filePath);
            if (!fileExists(source)) {
                throw new KnowledgeStoreError(`File not found: ${source}`, { filePath: source });
            }

            const target = join(this.documentsDir, basename(source));
            if (source !== target) {
                try {
                    copyFileSync(source, target);
                } catch (err) {
                    throw new KnowledgeStoreError(`Failed to store ${source}: ${errorMessage(err)}`, { filePath: source });
                }
            }
            return target;
        });
    }

    /**
     * Load documents, by default every file in the documents directory.
     * Unsupported types are skipped; files that fail to load are warned about and skipped.
     */
    async loadDocuments(filePaths?: readonly string[], subject = this.defaultSubject): Promise<LoadedDocument[]> {
        const paths = filePaths ?? this.storedPaths();
        const uploadedAt = this.clock().toISOString();
        const documents: LoadedDocument[] = [];

        for (const filePath of paths) {
            try {
                const doc = await loadDocument(filePath, subject, uploadedAt);
                if (!doc) {
                    logger.debug(`Skipping unsupported file ${filePath}`);
                    continue;
                }
                if (!doc.text.trim()) {
                    logger.warn(`No text extracted from ${basename(filePath)}`);
                    continue;
                }
                documents.push(doc);
            } catch (err) {
                logger.warn(`Error loading ${filePath}: ${errorMessage(err)}`);
            }
        }

        return documents;
    }

    /** Split documents into index-ready chunks (without embeddings). */
    chunkDocuments(documents: readonly LoadedDocument[]): Array<Omit<IndexRecord, 'embedding'>> {
        return documents.flatMap((doc) =>
            splitText(doc.text, {
                chunkSize: this.chunkSize,
                chunkOverlap: this.chunkOverlap,
                separators: DEFAULT_SEPARATORS,
            }).map((text, chunkIndex) => ({
                id: `${doc.metadata.source}#${chunkIndex}`,
                text,
                metadata: { ...doc.metadata, chunkIndex },
            })),
        );
    }

    /**
     * Store, chunk, embed and index files. Re-ingesting a file replaces its
     * earlier records.
     *
     * @throws {KnowledgeStoreError} if storing or indexing fails
     * @throws {ProviderError} if embedding fails
     */
    async ingest(filePaths: readonly string[], subject = this.defaultSubject): Promise<IngestSummary> {
        const supported = filePaths.filter(isSupportedDocument);
        const skipped = filePaths.filter((p) => !isSupportedDocument(p));
        for (const path of skipped) {
            logger.warn(`Skipping ${basename(path)}: only PDF, TXT and MD files are supported`);
        }

        const stored = this.saveFiles(supported);
        const documents = await this.loadDocuments(stored, subject);
        const chunks = this.chunkDocuments(documents);

        const records: IndexRecord[] = [];
        for (let start = 0; start < chunks.length; start += EMBED_BATCH_SIZE) {
            const batch = chunks.slice(start, start + EMBED_BATCH_SIZE);
            const vectors = await this.embedder.embed(batch.map((c) => c.text));

            batch.forEach((chunk, i) => {
                const embedding = vectors[i];
                if (!embedding) {
                    throw new KnowledgeStoreError(`Missing embedding for ${chunk.id}`, { id: chunk.id });
                }
                records.push({ ...chunk, embedding });
            });
            logger.debug(`Embedded ${Math.min(start + EMBED_BATCH_SIZE, chunks.length)}/${chunks.length} chunks`);
        }

        for (const doc of documents) {
            this.index.removeSource(doc.metadata.source);
        }
        this.index.append(records, this.embedder.model);

        return { files: stored, documents: documents.length, chunks: records.length, skipped };
    }

    /** Files in the documents directory, newest first. */
    listDocuments(): DocumentInfo[] {
        return this.storedPaths()
            .map((path) => {
                const stats = statSync(path);
                return { name: basename(path), path, size: stats.size, modified: stats.mtime };
            })
            .sort((a, b) => b.modified.getTime() - a.modified.getTime());
    }

    /**
     * Remove a stored document and its index records.
     *
     * @returns false when no such document exists
     */
    deleteDocument(name: string): boolean {
        const fileName = basename(name);
        const target = join(this.documentsDir, fileName);

        if (!fileExists(target)) return false;

        removePath(target);
        const removed = this.index.removeSource(fileName);
        logger.debug(`Deleted ${fileName} and ${removed} index records`);
        return true;
    }

    /** Delete the vector index; stored documents are kept. */
    clearIndex(): void {
        this.index.clear();
    }

    private storedPaths(): string[] {
        if (!fileExists(this.documentsDir)) return [];

        return readdirSync(this.documentsDir, { withFileTypes: true })
            .filter((entry) => entry.isFile())
            .map((entry) => join(this.documentsDir, entry.name));
    }
}
