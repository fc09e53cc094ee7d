/**
 * Library entry point for embedding the study assistant in other programs.
 */

export * from './types/index.js';

export { loadConfig, saveConfig, getDefaultConfig, configExists } from './core/config/manager.js';
export {
    StudyBuddy,
    createStudyBuddy,
    createKnowledgeBase,
    formatUserFacingError,
    EMPTY_STORE_MESSAGE,
    EMPTY_WEB_MESSAGE,
} from './core/workflow/orchestrator.js';
export { StudySession, saveSession, loadSession, listSessions } from './core/workflow/session.js';
export { runQuestionQueue, parseQuestions } from './core/workflow/question-queue.js';
export { TokenTracker } from './core/workflow/token-tracker.js';
export { createCycleContext, transition, isTerminal } from './core/workflow/engine.js';
export {
    extractTopic,
    extractCount,
    extractDifficulty,
    extractStudyPlanRequest,
    parseTaskRequest,
    type TaskRequest,
} from './core/workflow/request-parser.js';
export { RouterAgent, matchCue, parseRoutingResponse } from './agents/router.js';
export { AnswerSynthesizer } from './agents/synthesizer.js';
export { createAgents } from './agents/factory.js';
export * from './agents/generators/index.js';
export { KnowledgeBase } from './knowledge/knowledge-base.js';
export { ContextProvider } from './knowledge/context-provider.js';
export { VectorIndex, cosineSimilarity } from './knowledge/vector-index.js';
export { splitText } from './knowledge/chunker.js';
export { WebLookupProvider } from './web/web-lookup.js';
export { TavilySearchClient } from './web/tavily.js';
export { HttpPageFetcher, htmlToPlainText } from './web/page-fetcher.js';
export { createProvider } from './providers/registry.js';
export { createEmbeddingProvider } from './providers/embeddings/registry.js';
