/**
 * Global shared types re-exported from a single entry point.
 *
 * Dependency direction: types/index.ts → nothing (leaf module)
 * Used by: the package entry point
 */

// Re-export all error types
export {
    AppError,
    ConfigError,
    ProviderError,
    WorkflowError,
    ValidationError,
    KnowledgeStoreError,
    SearchError,
} from '../core/errors.js';

// Re-export config types
export type {
    AppConfig,
    ProviderConfig,
    ModelsConfig,
    ModelRoleConfig,
    EmbeddingsConfig,
    KnowledgeConfig,
    RetrievalConfig,
    SearchConfig,
    StudyConfig,
} from '../core/config/types.js';

// Re-export provider types
export type {
    LLMProvider,
    ChatMessage,
    ChatOptions,
    ChatResponse,
    ChatChunk,
    ModelInfo,
    ModelKind,
    LLMProviderName,
    TokenUsage,
} from '../providers/types.js';
export type { EmbeddingProvider } from '../providers/embeddings/types.js';

// Re-export agent and result types
export type { Branch, GeneratorBranch, ModelRole, StreamCallbacks } from '../agents/types.js';
export type { RoutingDecision, RoutingReason } from '../agents/router.js';
export type { ContextChunk, DocumentInfo } from '../knowledge/types.js';
export type { SearchClient, SearchHit, PageFetcher } from '../web/types.js';
export type { ToolResult, QueryOptions } from '../core/workflow/orchestrator.js';
export type { CycleState, CycleContext, TransitionRecord } from '../core/workflow/engine.js';
