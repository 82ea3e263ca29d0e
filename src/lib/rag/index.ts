/**
 * RAG Module Exports
 *
 * Provides all RAG pipeline functionality:
 * - Document preparation and chunking
 * - Embedding generation
 * - Vector index adapters, sessions and curated answers
 * - Query rewriting, prompt assembly and citation mapping
 * - Chat orchestration and the engine facade
 */

// Configuration
export {
  loadRAGConfig,
  DEFAULT_RAG_CONFIG,
  INGESTION_POLICIES,
  VECTOR_STORES,
  type RAGConfig,
  type IngestionConcurrencyPolicy,
  type VectorStoreKind,
} from './config';

// Chunker
export {
  normalizeText,
  chunkText,
  buildChunks,
  chunkId,
  estimateTokens,
  type TextChunk,
  type ChunkOptions,
} from './chunker';

// Ingestion
export {
  IngestionPipeline,
  hashContent,
  type IngestInput,
  type PreparedDocument,
  type IngestionPipelineOptions,
} from './ingestion';

// Embeddings
export {
  EmbeddingService,
  createEmbeddingService,
  toEmbeddingError,
  type Embedder,
  type EmbedOptions,
  type EmbeddingProvider,
  type EmbeddingConfig,
} from './embeddings';

// Storage
export * from './vector-index';
export {
  InMemoryDocumentStore,
  PgDocumentStore,
  type DocumentStore,
  type StatusUpdate,
} from './document-store';
export {
  InMemorySessionStore,
  PgSessionStore,
  type SessionStore,
  type SessionLimits,
  type PgSessionStoreOptions,
} from './sessions';
export {
  InMemoryCuratedAnswerStore,
  PgCuratedAnswerStore,
  type CuratedAnswerStore,
  type PgCuratedAnswerStoreOptions,
} from './curated-answers';

// Prompt & Citations
export { rewriteQuery, type QueryRewriteOptions } from './query-rewriter';
export {
  assemblePrompt,
  toPromptContext,
  countPromptChars,
  type PromptBudget,
  type AssembledPrompt,
} from './prompt-builder';
export {
  parseCitations,
  validateCitations,
  extractCitationNumbers,
  formatSourcesSection,
  type Citation,
  type CitationCheck,
} from './citations';

// Orchestration
export {
  ChatOrchestrator,
  RunTrace,
  toOrchestratorConfig,
  type ChatRequest,
  type ChatResponse,
  type ChatSource,
  type ChatStatus,
  type ChatStreamCallbacks,
  type CuratedMatch,
  type Generator,
  type OrchestratorConfig,
} from './orchestrator';

// Engine
export {
  RAGEngine,
  createRAGEngineFromConfig,
  type RAGEngineDeps,
  type RAGEngineHandle,
  type RAGEngineOverrides,
  type IngestDocumentInput,
  type IngestResult,
  type IngestionOutcome,
  type EngineChatRequest,
  type DeleteResult,
  type CuratedAnswerInput,
} from './engine';
