/**
 * Tavily search client over its REST API.
 *
 * Dependency direction: tavily.ts → web/types, zod, core/errors
 * Used by: study assistant factory
 */

import { z } from 'zod';
import type { SearchClient, SearchHit } from './types.js';
import { SearchError, errorMessage } from '../core/errors.js';
import { logger } from '../utils/logger.js';

export interface TavilyClientConfig {
    apiKey?: string;
    baseUrl: string;
    searchDepth: 'basic' | 'advanced';
}

const searchResponseSchema = z.object({
    results: z
        .array(
            z.object({
                url: z.string().optional(),
                title: z.string().optional(),
                content: z.string().optional(),
            }),
        )
        .default([]),
});

export class TavilySearchClient implements SearchClient {
    private readonly baseUrl: string;

    constructor(private readonly config: TavilyClientConfig) {
        this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    }

    async search(query: string, maxResults: number, domainFilter?: readonly string[]): Promise<SearchHit[]> {
        if (!this.config.apiKey) {
            throw new SearchError('No Tavily API key configured. Set search.apiKey or TAVILY_API_KEY.');
        }

        const body = {
            query,
            max_results: maxResults,
            search_depth: this.config.searchDepth,
            ...(domainFilter && domainFilter.length > 0 ? { include_domains: domainFilter } : {}),
        };

        let response: Response;
        try {
            response = await fetch(`${this.baseUrl}/search`, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    Authorization: `Bearer ${this.config.apiKey}`,
                },
                body: JSON.stringify(body),
            });
        } catch (err) {
            throw new SearchError(`Search request failed: ${errorMessage(err)}`, { baseUrl: this.baseUrl });
        }

        if (!response.ok) {
            throw new SearchError(`Search API error: ${response.status} ${response.statusText}`, {
                status: response.status,
            });
        }

        let data: unknown;
        try {
            data = await response.json();
        } catch (err) {
            throw new SearchError(`Search API returned invalid JSON: ${errorMessage(err)}`);
        }

        const parsed = searchResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw new SearchError('Search API returned an unexpected response shape', {
                issues: parsed.error.issues,
            });
        }

        const hits: SearchHit[] = [];
        for (const result of parsed.data.results) {
            if (result.url) hits.push({ url: result.url, title: result.title });
        }

        logger.debug(`Search returned ${hits.length} URLs for "${query}"`);
        return hits.slice(0, maxResults);
    }
}
