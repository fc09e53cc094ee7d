/**
 * Web lookup provider: search, fetch each hit, tag the text with its URL.
 *
 * Never throws: a failed search yields [] and a failed page is left out.
 *
 * Dependency direction: web-lookup.ts → web/types, knowledge/types
 * Used by: orchestrator
 */

import type { PageFetcher, SearchClient } from './types.js';
import type { ContextChunk } from '../knowledge/types.js';
import { errorMessage } from '../core/errors.js';
import { logger } from '../utils/logger.js';

/** Anything that can look a question up on the web. */
export interface WebSource {
    search(query: string, maxResults: number): Promise<ContextChunk[]>;
}

export class WebLookupProvider implements WebSource {
    constructor(
        private readonly client: SearchClient,
        private readonly fetcher: PageFetcher,
        private readonly domainFilter: readonly string[] = [],
    ) {}

    async search(query: string, maxResults: number): Promise<ContextChunk[]> {
        let urls: string[];
        try {
            const hits = await this.client.search(query, maxResults, this.domainFilter);
            urls = hits.map((hit) => hit.url).slice(0, maxResults);
        } catch (err) {
            logger.warn(`Web search failed: ${errorMessage(err)}`);
            return [];
        }

        const chunks: ContextChunk[] = [];
        for (const url of urls) {
            try {
                const text = (await this.fetcher.fetch(url)).trim();
                if (!text) {
                    logger.debug(`No text extracted from ${url}`);
                    continue;
                }
                chunks.push({ text, sourceId: url });
            } catch (err) {
                logger.debug(`Skipping ${url}: ${errorMessage(err)}`);
            }
        }

        logger.debug(`Web lookup kept ${chunks.length} of ${urls.length} pages`);
        return chunks;
    }
}
