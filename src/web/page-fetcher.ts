/**
 * HTTP page fetcher: GET with a timeout, HTML converted to plain text.
 *
 * Dependency direction: page-fetcher.ts → html-to-text, web/types
 * Used by: web lookup provider
 */

import { convert } from 'html-to-text';
import type { PageFetcher } from './types.js';

const USER_AGENT = 'Mozilla/5.0 (compatible; studymate/0.1)';

/** Convert an HTML document to readable text, dropping links and images. */
export function htmlToPlainText(html: string): string {
    return convert(html, {
        wordwrap: false,
        selectors: [
            { selector: 'a', options: { ignoreHref: true } },
            { selector: 'img', format: 'skip' },
            { selector: 'nav', format: 'skip' },
            { selector: 'footer', format: 'skip' },
        ],
    }).trim();
}

export class HttpPageFetcher implements PageFetcher {
    constructor(private readonly timeoutMs: number) {}

    async fetch(url: string): Promise<string> {
        const response = await fetch(url, {
            signal: AbortSignal.timeout(this.timeoutMs),
            headers: { 'User-Agent': USER_AGENT },
        });
        if (!response.ok) {
            throw new Error(`Unable to fetch ${url} (${response.status})`);
        }

        const body = await response.text();
        const contentType = response.headers.get('content-type') ?? '';

        return contentType.includes('html') || /^\s*<(?:!doctype|html)/i.test(body)
            ? htmlToPlainText(body)
            : body.trim();
    }
}
