/**
 * Knowledge store data shapes.
 *
 * Dependency direction: knowledge/types.ts → zod
 * Used by: loaders, chunker, vector index, knowledge base, context provider, web lookup
 */

import { z } from 'zod';

/**
 * One piece of retrieved text. `sourceId` is a stored document's basename
 * or a fetched URL.
 */
export interface ContextChunk {
    readonly text: string;
    readonly sourceId: string;
    /** 1-based rank by descending similarity; index chunks only. */
    readonly similarityRank?: number;
}

export const chunkMetadataSchema = z.object({
    /** Document basename; becomes the chunk's sourceId. */
    source: z.string().min(1),
    subject: z.string(),
    uploadedAt: z.string(),
    filePath: z.string(),
    chunkIndex: z.number().int().min(0),
});

export type ChunkMetadata = z.infer<typeof chunkMetadataSchema>;

export const indexRecordSchema = z.object({
    id: z.string().min(1),
    text: z.string(),
    embedding: z.array(z.number()).min(1),
    metadata: chunkMetadataSchema,
});

/** One line of index.jsonl. */
export type IndexRecord = z.infer<typeof indexRecordSchema>;

export const indexManifestSchema = z.object({
    version: z.literal(1),
    embeddingModel: z.string().min(1),
    dimensions: z.number().int().min(1),
    createdAt: z.string(),
    updatedAt: z.string(),
});

export type IndexManifest = z.infer<typeof indexManifestSchema>;

/** A source file's full text before chunking. */
export interface LoadedDocument {
    text: string;
    metadata: Omit<ChunkMetadata, 'chunkIndex'>;
}

/** A file in the documents directory. */
export interface DocumentInfo {
    name: string;
    path: string;
    size: number;
    modified: Date;
}
