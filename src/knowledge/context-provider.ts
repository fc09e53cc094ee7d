/**
 * Context provider: top-k chunks from the vector index for a query.
 *
 * Dependency direction: context-provider.ts → vector-index, embeddings/types
 * Used by: orchestrator
 */

import type { ContextChunk } from './types.js';
import type { VectorIndex } from './vector-index.js';
import type { EmbeddingProvider } from '../providers/embeddings/types.js';
import { ProviderError } from '../core/errors.js';
import { logger } from '../utils/logger.js';

/** Anything that can answer a retrieval query. */
export interface ContextSource {
    retrieve(query: string, k: number): Promise<ContextChunk[]>;
}

export class ContextProvider implements ContextSource {
    constructor(
        private readonly index: VectorIndex,
        private readonly embedder: EmbeddingProvider,
    ) {}

    /**
     * Retrieve up to `k` chunks in descending similarity order.
     * Returns [] when no index exists yet; embedding failures propagate.
     *
     * @throws {ProviderError} if the query cannot be embedded
     * @throws {KnowledgeStoreError} if the index is corrupt or was built with
     *   another embedding model
     */
    async retrieve(query: string, k: number): Promise<ContextChunk[]> {
        if (!this.index.exists()) {
            logger.debug('No vector index yet; retrieval returns nothing');
            return [];
        }

        const [embedding] = await this.embedder.embed([query]);
        if (!embedding) {
            throw new ProviderError('Embedding provider returned no vector for the query', {
                provider: this.embedder.name,
            });
        }

        const results = this.index.query(embedding, k, this.embedder.model);
        logger.debug(`Retrieved ${results.length} chunks (k=${k})`);

        return results.map(({ record, rank }) => ({
            text: record.text,
            sourceId: record.metadata.source,
            similarityRank: rank,
        }));
    }
}
