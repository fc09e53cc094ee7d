/**
 * Web lookup collaborators.
 *
 * Dependency direction: web/types.ts → nothing (leaf module)
 * Used by: tavily client, page fetcher, web lookup provider
 */

export interface SearchHit {
    url: string;
    title?: string;
}

/** A web search API. */
export interface SearchClient {
    /**
     * @throws {SearchError} when the search cannot be performed
     */
    search(query: string, maxResults: number, domainFilter?: readonly string[]): Promise<SearchHit[]>;
}

/** Fetches a page and returns its readable text. */
export interface PageFetcher {
    /**
     * @throws on HTTP errors and timeouts
     */
    fetch(url: string): Promise<string>;
}
