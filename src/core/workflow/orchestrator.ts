/**
 * Study assistant orchestrator: runs one question through the cycle.
 *
 * Flow: route → branch (gather context or generate) → synthesize → done.
 * Every step goes through the state machine in engine.ts, so the returned
 * history is exactly the path taken.
 *
 * Dependency direction: orchestrator.ts → engine, agents, knowledge, web, config
 * Used by: CLI commands, question queue
 */

import type { AppConfig, RetrievalConfig, SearchConfig, StudyConfig } from '../config/types.js';
import type { Agents } from '../../agents/factory.js';
import type { Branch, StreamCallbacks } from '../../agents/types.js';
import type { RoutingDecision, RoutingReason } from '../../agents/router.js';
import type { TaskMetadata, TaskResult } from '../../agents/generators/types.js';
import type { ContextChunk } from '../../knowledge/types.js';
import type { ContextSource } from '../../knowledge/context-provider.js';
import type { WebSource } from '../../web/web-lookup.js';
import type { StudySession } from './session.js';
import { createCycleContext, transition, type CycleContext, type CycleEvent, type TransitionRecord } from './engine.js';
import { parseTaskRequest, type TaskRequest } from './request-parser.js';
import { TokenTracker } from './token-tracker.js';
import { createAgents } from '../../agents/factory.js';
import { createEmbeddingProvider } from '../../providers/embeddings/registry.js';
import { VectorIndex } from '../../knowledge/vector-index.js';
import { ContextProvider } from '../../knowledge/context-provider.js';
import { KnowledgeBase } from '../../knowledge/knowledge-base.js';
import { TavilySearchClient } from '../../web/tavily.js';
import { HttpPageFetcher } from '../../web/page-fetcher.js';
import { WebLookupProvider } from '../../web/web-lookup.js';
import { resolveProjectPath } from '../config/manager.js';
import { AppError, ValidationError, errorMessage } from '../errors.js';
import { nonEmptyString, parseOrThrow } from '../../utils/validation.js';
import { logger } from '../../utils/logger.js';

export const EMPTY_STORE_MESSAGE = 'No documents found in knowledge base. Please upload study materials first.';
export const EMPTY_WEB_MESSAGE = 'No relevant web results found.';

/** The answer to one question and how it was produced. */
export interface ToolResult {
    answerText: string;
    toolUsed: Branch;
    /** Chunks the answer was built from; empty when nothing was retrieved. */
    contextUsed: readonly ContextChunk[];
    /** Generator parameters, for the six generator branches only. */
    taskMetadata?: TaskMetadata;
    /** ISO-8601 timestamp. */
    generatedAt: string;
    /** Tokens across every model call in the cycle. */
    tokensUsed: number;
    routingReason: RoutingReason;
    history: readonly TransitionRecord[];
}

export interface QueryOptions {
    /** Receives the exchange on success; supplies the exam-date preference. */
    session?: StudySession;
    /** Stream the answering step's output. */
    stream?: StreamCallbacks;
    /** Called after every state transition. */
    onStateChange?: (ctx: CycleContext) => void;
    /**
     * Run this generator task as given instead of routing the question and
     * reading parameters from its text. The question is still used for
     * retrieval and the session record.
     */
    task?: TaskRequest;
}

export interface StudyBuddyOptions {
    agents: Agents;
    context: ContextSource;
    web: WebSource;
    retrieval: RetrievalConfig;
    search: Pick<SearchConfig, 'maxResults' | 'contextCharLimit'>;
    study: StudyConfig;
    clock?: () => Date;
}

interface GeneratorRun {
    result: TaskResult;
    chunks: readonly ContextChunk[];
    context: string;
}

/** Join retrieved chunk texts with blank lines. */
export function joinChunks(chunks: readonly ContextChunk[], charLimit?: number): string {
    return chunks.map((c) => (charLimit === undefined ? c.text : c.text.slice(0, charLimit))).join('\n\n');
}

export class StudyBuddy {
    private readonly agents: Agents;
    private readonly contextSource: ContextSource;
    private readonly web: WebSource;
    private readonly retrieval: RetrievalConfig;
    private readonly search: Pick<SearchConfig, 'maxResults' | 'contextCharLimit'>;
    private readonly study: StudyConfig;
    private readonly clock: () => Date;

    constructor(options: StudyBuddyOptions) {
        this.agents = options.agents;
        this.contextSource = options.context;
        this.web = options.web;
        this.retrieval = options.retrieval;
        this.search = options.search;
        this.study = options.study;
        this.clock = options.clock ?? (() => new Date());
    }

    /**
     * Answer one question.
     *
     * On success the question and answer are appended to the session together;
     * on failure the session is left untouched and the error propagates.
     *
     * @throws {ValidationError} if the question is empty
     * @throws {ProviderError} if a model or embedding call fails
     * @throws {KnowledgeStoreError} if the vector index is corrupt
     */
    async query(question: string, options: QueryOptions = {}): Promise<ToolResult> {
        const text = parseOrThrow(nonEmptyString, question, 'question');

        let ctx = createCycleContext(text);
        const advance = (event: CycleEvent): void => {
            ctx = transition(ctx, event, this.clock().getTime());
            logger.debug(`Cycle: ${ctx.history.at(-1)?.from ?? 'start'} → ${ctx.state}`);
            options.onStateChange?.(ctx);
        };

        advance({ type: 'ROUTE' });
        const decision: RoutingDecision = options.task
            ? { branch: options.task.branch, reason: 'requested', tokensUsed: 0 }
            : await this.agents.router.decide(text);
        advance({ type: 'BRANCH_SELECTED', payload: { branch: decision.branch } });

        let tokensUsed = decision.tokensUsed;
        let taskMetadata: TaskMetadata | undefined;
        let generatedAt: string;

        if (decision.branch === 'document-search' || decision.branch === 'web-search') {
            const chunks =
                decision.branch === 'document-search'
                    ? await this.contextSource.retrieve(text, this.retrieval.topK['document-search'])
                    : await this.web.search(text, this.search.maxResults);
            const context =
                decision.branch === 'document-search'
                    ? chunks.length > 0 ? joinChunks(chunks) : EMPTY_STORE_MESSAGE
                    : chunks.length > 0 ? joinChunks(chunks, this.search.contextCharLimit) : EMPTY_WEB_MESSAGE;

            advance({ type: 'CONTEXT_GATHERED', payload: { chunks, context } });

            const output = await this.agents.synthesizer.answer(text, context, options.stream);
            tokensUsed += output.tokensUsed;
            generatedAt = this.clock().toISOString();

            advance({ type: 'ANSWER_READY', payload: { answer: output.content } });
        } else {
            const task =
                options.task ??
                parseTaskRequest(decision.branch, text, {
                    examDate: options.session?.examDate,
                    hoursPerDay: this.study.hoursPerDay,
                });
            const run = await this.runTask(task, text, options);
            tokensUsed += run.result.tokensUsed;
            taskMetadata = run.result.metadata;
            generatedAt = run.result.generatedAt;

            advance({ type: 'ANSWER_READY', payload: { answer: run.result.text, chunks: run.chunks, context: run.context } });
        }

        const answerText = ctx.answer ?? '';
        options.session?.recordExchange(text, answerText, decision.branch);

        return {
            answerText,
            toolUsed: decision.branch,
            contextUsed: ctx.chunks,
            ...(taskMetadata ? { taskMetadata } : {}),
            generatedAt,
            tokensUsed,
            routingReason: decision.reason,
            history: ctx.history,
        };
    }

    private async gather(question: string, k: number): Promise<{ chunks: ContextChunk[]; context: string }> {
        const chunks = await this.contextSource.retrieve(question, k);
        return { chunks, context: chunks.length > 0 ? joinChunks(chunks) : EMPTY_STORE_MESSAGE };
    }

    private async runTask(task: TaskRequest, question: string, options: QueryOptions): Promise<GeneratorRun> {
        const { generators } = this.agents;
        const { topK } = this.retrieval;
        const study = this.study;
        const stream = options.stream;

        switch (task.branch) {
            case 'long-form-answer': {
                const gathered = await this.gather(question, topK['long-form-answer']);
                const result = await generators['long-form-answer'].generate(task.question, gathered.context, {}, stream);
                return { result, ...gathered };
            }
            case 'quiz': {
                const gathered = await this.gather(question, topK.quiz);
                const result = await generators.quiz.generate(
                    task.topic,
                    gathered.context,
                    {
                        numQuestions: task.numQuestions ?? study.quizQuestions,
                        difficulty: task.difficulty ?? study.quizDifficulty,
                    },
                    stream,
                );
                return { result, ...gathered };
            }
            case 'flashcards': {
                const gathered = await this.gather(question, topK.flashcards);
                const result = await generators.flashcards.generate(
                    task.topic,
                    gathered.context,
                    { numCards: task.numCards ?? study.flashcards },
                    stream,
                );
                return { result, ...gathered };
            }
            case 'explain-concept': {
                const gathered = await this.gather(question, topK['explain-concept']);
                const result = await generators['explain-concept'].generate(
                    task.topic,
                    gathered.context,
                    { difficulty: task.difficulty ?? study.explainDifficulty },
                    stream,
                );
                return { result, ...gathered };
            }
            case 'important-questions': {
                const gathered = await this.gather(question, topK['important-questions']);
                const result = await generators['important-questions'].generate(
                    task.topic,
                    gathered.context,
                    { numQuestions: task.numQuestions ?? study.importantQuestions },
                    stream,
                );
                return { result, ...gathered };
            }
            case 'study-plan': {
                const result = await generators['study-plan'].generate(
                    task.topics.join(', '),
                    '',
                    {
                        topics: task.topics,
                        examDate: task.examDate ?? options.session?.examDate,
                        hoursPerDay: task.hoursPerDay ?? study.hoursPerDay,
                    },
                    stream,
                );
                return { result, chunks: [], context: '' };
            }
        }
    }
}

/**
 * Render a failure for the person asking.
 */
export function formatUserFacingError(err: unknown): string {
    const hint =
        err instanceof ValidationError
            ? ''
            : err instanceof AppError
              ? '\nCheck your configuration and services with "studymate doctor".'
              : '';
    return `Sorry, I couldn't answer that. ${errorMessage(err)}${hint}`;
}

export interface ServiceOptions {
    clock?: () => Date;
    /** Receives token usage for every model call. */
    tracker?: TokenTracker;
}

/**
 * Open the knowledge base (documents directory plus vector index) for a project.
 *
 * @throws {ProviderError} if the embedding provider is not configured
 */
export function createKnowledgeBase(config: AppConfig, projectRoot: string, options: ServiceOptions = {}): KnowledgeBase {
    const embedder = createEmbeddingProvider(config.embeddings, config.providers);
    return new KnowledgeBase({
        documentsDir: resolveProjectPath(projectRoot, config.knowledge.documentsDir),
        index: new VectorIndex(resolveProjectPath(projectRoot, config.knowledge.indexDir), options.clock),
        embedder,
        chunkSize: config.knowledge.chunkSize,
        chunkOverlap: config.knowledge.chunkOverlap,
        defaultSubject: config.knowledge.defaultSubject,
        clock: options.clock,
    });
}

/**
 * Build every service once and wire them into a StudyBuddy.
 *
 * @throws {ProviderError} if a configured provider is missing its settings
 */
export function createStudyBuddy(config: AppConfig, projectRoot: string, options: ServiceOptions = {}): StudyBuddy {
    const tracker = options.tracker ?? new TokenTracker();
    const agents = createAgents(config, projectRoot, {
        clock: options.clock,
        onUsage: (role, model, usage) => tracker.record(role, model, usage),
    });

    const embedder = createEmbeddingProvider(config.embeddings, config.providers);
    const index = new VectorIndex(resolveProjectPath(projectRoot, config.knowledge.indexDir), options.clock);

    const searchClient = new TavilySearchClient({
        apiKey: config.search.apiKey,
        baseUrl: config.search.baseUrl,
        searchDepth: config.search.searchDepth,
    });
    const web = new WebLookupProvider(
        searchClient,
        new HttpPageFetcher(config.search.fetchTimeoutMs),
        config.search.includeDomains,
    );

    return new StudyBuddy({
        agents,
        context: new ContextProvider(index, embedder),
        web,
        retrieval: config.retrieval,
        search: config.search,
        study: config.study,
        clock: options.clock,
    });
}
