/**
 * In-process stand-ins for the model, embedding, search and page-fetch services.
 */

import type {
    ChatChunk,
    ChatMessage,
    ChatOptions,
    ChatResponse,
    LLMProvider,
    ModelInfo,
} from '../../src/providers/types.js';
import type { EmbeddingProvider } from '../../src/providers/embeddings/types.js';
import type { PageFetcher, SearchClient, SearchHit } from '../../src/web/types.js';

export interface RecordedCall {
    messages: ChatMessage[];
    options?: ChatOptions;
}

type Reply = string | Error | ((messages: ChatMessage[], options?: ChatOptions) => string);

/**
 * Replies with scripted answers in order; the last reply repeats once the
 * script runs out. Every call is recorded.
 */
export class ScriptedProvider implements LLMProvider {
    readonly name = 'ollama' as const;
    readonly calls: RecordedCall[] = [];
    streamFailure?: Error;
    private readonly replies: Reply[];

    constructor(...replies: Reply[]) {
        this.replies = replies.length > 0 ? replies : ['ok'];
    }

    private next(messages: ChatMessage[], options?: ChatOptions): string {
        this.calls.push({ messages, options });
        const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
        if (reply instanceof Error) throw reply;
        if (typeof reply === 'function') return reply(messages, options);
        return reply ?? '';
    }

    async chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
        const content = this.next(messages, options);
        return {
            content,
            model: options?.model ?? 'fake-model',
            usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
            finishReason: 'stop',
        };
    }

    async *stream(messages: ChatMessage[], options?: ChatOptions): AsyncIterable<ChatChunk> {
        if (this.streamFailure) throw this.streamFailure;
        const content = this.next(messages, options);
        const middle = Math.ceil(content.length / 2);
        yield { content: content.slice(0, middle), done: false };
        yield { content: content.slice(middle), done: false };
        yield { content: '', done: true };
    }

    async listModels(): Promise<ModelInfo[]> {
        return [{ id: 'fake-model', name: 'fake-model', provider: 'ollama', kind: 'chat' }];
    }

    async validateConnection(): Promise<boolean> {
        return true;
    }

    /** The user prompt of the nth call. */
    userPrompt(index = 0): string {
        return this.calls[index]?.messages.find((m) => m.role === 'user')?.content ?? '';
    }
}

const VOCABULARY = ['photosynthesis', 'chlorophyll', 'graph', 'tree', 'exam', 'cell', 'energy', 'sorting'];

/**
 * Bag-of-words embedding over a small fixed vocabulary, plus a constant
 * component so no vector is all zeros.
 */
export function embedText(text: string): number[] {
    const lower = text.toLowerCase();
    return [...VOCABULARY.map((word) => lower.split(word).length - 1), 1];
}

export class FakeEmbedder implements EmbeddingProvider {
    readonly name = 'ollama' as const;
    readonly batches: string[][] = [];

    constructor(readonly model = 'fake-embed') {}

    async embed(texts: readonly string[]): Promise<number[][]> {
        this.batches.push([...texts]);
        return texts.map(embedText);
    }

    async validateConnection(): Promise<boolean> {
        return true;
    }
}

export class StubSearchClient implements SearchClient {
    readonly queries: Array<{ query: string; maxResults: number; domainFilter?: readonly string[] }> = [];

    constructor(private readonly result: SearchHit[] | Error) {}

    async search(query: string, maxResults: number, domainFilter?: readonly string[]): Promise<SearchHit[]> {
        this.queries.push({ query, maxResults, domainFilter });
        if (this.result instanceof Error) throw this.result;
        return this.result;
    }
}

/** Serves page text by URL; an Error value makes that fetch fail. */
export class StubPageFetcher implements PageFetcher {
    readonly fetched: string[] = [];

    constructor(private readonly pages: Record<string, string | Error>) {}

    async fetch(url: string): Promise<string> {
        this.fetched.push(url);
        const page = this.pages[url];
        if (page === undefined) throw new Error(`404 for ${url}`);
        if (page instanceof Error) throw page;
        return page;
    }
}
