/**
 * RAG Engine
 *
 * Entry points for the service layer:
 * - ingestDocument / ingestBatch: prepare → embed → upsert → prune → mark ready
 * - chat / chatStream: grounded answers with per-session history
 * - deleteDocument, listDocuments, getDocument
 * - addCuratedAnswer, listCuratedAnswers, deleteCuratedAnswer
 */

import { randomUUID } from 'node:crypto';
import type {
  ChatMode,
  ConversationTurn,
  CuratedAnswer,
  DocumentMetadata,
  IndexEntry,
  QueryFilter,
  StoredDocument,
} from '@/types/rag';
import type { LLMAdapter } from '@/types/llm';
import {
  ConfigurationError,
  IngestionInProgressError,
  InvalidRequestError,
  getErrorMessage,
} from '@/lib/errors';
import { loggers, logIngestionStep, Timer } from '@/lib/logger';
import { KeyedLock } from '@/lib/utils/keyed-lock';
import { throwIfAborted } from '@/lib/utils/retry';
import { createLLMAdapterFromConfig } from '@/lib/llm';
import { createDb } from '@/db';
import type { IngestionConcurrencyPolicy, RAGConfig } from './config';
import { IngestionPipeline, type IngestInput } from './ingestion';
import { createEmbeddingService, type Embedder } from './embeddings';
import { InMemoryVectorIndex, PgVectorIndex, type VectorIndex } from './vector-index';
import { InMemoryDocumentStore, PgDocumentStore, type DocumentStore } from './document-store';
import { InMemorySessionStore, PgSessionStore, type SessionStore } from './sessions';
import { InMemoryCuratedAnswerStore, PgCuratedAnswerStore, type CuratedAnswerStore } from './curated-answers';
import {
  ChatOrchestrator,
  toOrchestratorConfig,
  type ChatResponse,
  type ChatStreamCallbacks,
  type Generator,
  type OrchestratorConfig,
} from './orchestrator';

const log = loggers.ingestion.child({ service: 'RAGEngine' });

// =============================================================================
// Types
// =============================================================================

export interface IngestDocumentInput extends IngestInput {
  signal?: AbortSignal;
}

export interface IngestResult {
  documentId: string;
  chunkCount: number;
}

export type IngestionOutcome =
  | ({ ok: true; filename: string } & IngestResult)
  | { ok: false; filename: string; documentId?: string; error: Error };

export interface EngineChatRequest {
  query: string;
  sessionId: string;
  /** Omit to use the stored session history */
  history?: ConversationTurn[];
  mode?: ChatMode;
  filter?: QueryFilter;
  topK?: number;
  signal?: AbortSignal;
}

export interface DeleteResult {
  removedEntries: number;
}

export interface CuratedAnswerInput {
  question: string;
  answer: string;
  /** Generated when omitted; an existing id is replaced */
  id?: string;
  metadata?: DocumentMetadata;
}

export interface RAGEngineDeps {
  pipeline: IngestionPipeline;
  embedder: Embedder;
  index: VectorIndex;
  documents: DocumentStore;
  sessions: SessionStore;
  generator: Generator;
  orchestrator: OrchestratorConfig;
  /** Omit to answer from documents only */
  curated?: CuratedAnswerStore;
  ingestionConcurrencyPolicy?: IngestionConcurrencyPolicy;
}

// =============================================================================
// RAG Engine Class
// =============================================================================

export class RAGEngine {
  private readonly pipeline: IngestionPipeline;
  private readonly embedder: Embedder;
  private readonly index: VectorIndex;
  private readonly documents: DocumentStore;
  private readonly sessions: SessionStore;
  private readonly curated?: CuratedAnswerStore;
  private readonly orchestrator: ChatOrchestrator;
  private readonly policy: IngestionConcurrencyPolicy;
  private readonly locks = new KeyedLock();

  constructor(deps: RAGEngineDeps) {
    this.pipeline = deps.pipeline;
    this.embedder = deps.embedder;
    this.index = deps.index;
    this.documents = deps.documents;
    this.sessions = deps.sessions;
    this.curated = deps.curated;
    this.policy = deps.ingestionConcurrencyPolicy ?? 'serialize';
    this.orchestrator = new ChatOrchestrator(
      deps.embedder,
      deps.index,
      deps.generator,
      deps.orchestrator,
      deps.curated
    );
  }

  // ===========================================================================
  // Ingestion
  // ===========================================================================

  /**
   * Ingest one file. Re-ingesting a document id replaces its chunks.
   *
   * @throws IngestionInProgressError under the `reject` policy when the id is busy
   */
  async ingestDocument(input: IngestDocumentInput): Promise<IngestResult> {
    const documentId = input.documentId ?? randomUUID();
    const task = () => this.ingest({ ...input, documentId }, documentId);

    switch (this.policy) {
      case 'none':
        return task();
      case 'reject':
        if (this.locks.isLocked(documentId)) {
          throw new IngestionInProgressError(documentId);
        }
        return this.locks.run(documentId, task);
      case 'serialize':
        return this.locks.run(documentId, task);
    }
  }

  /**
   * Ingest files one after another. A failure is reported in its slot and
   * does not stop the rest.
   */
  async ingestBatch(inputs: IngestDocumentInput[]): Promise<IngestionOutcome[]> {
    const outcomes: IngestionOutcome[] = [];

    for (const input of inputs) {
      try {
        const result = await this.ingestDocument(input);
        outcomes.push({ ok: true, filename: input.filename, ...result });
      } catch (error) {
        outcomes.push({
          ok: false,
          filename: input.filename,
          documentId: input.documentId,
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
    }

    const failed = outcomes.filter((o) => !o.ok).length;
    log.info(
      { event: 'batch_complete', total: inputs.length, failed },
      `Batch ingestion finished: ${inputs.length - failed}/${inputs.length} succeeded`
    );
    return outcomes;
  }

  private async ingest(input: IngestDocumentInput, documentId: string): Promise<IngestResult> {
    const timer = new Timer();
    throwIfAborted(input.signal, 'ingestion');

    const { document, chunks } = await this.pipeline.prepare({ ...input, documentId });

    const stored: StoredDocument = {
      id: document.id,
      filename: document.filename,
      contentType: document.contentType,
      contentHash: document.contentHash,
      metadata: document.metadata,
      uploadedAt: document.uploadedAt,
      status: 'processing',
      chunkCount: chunks.length,
      charCount: document.text.length,
      errorMessage: null,
    };
    await this.documents.save(stored);

    try {
      timer.mark('embed');
      const vectors = await this.embedder.embedBatch(
        chunks.map((chunk) => chunk.content),
        { signal: input.signal }
      );
      logIngestionStep(log, 'embed', { duration_ms: timer.measure('embed'), chunks: vectors.length });
      throwIfAborted(input.signal, 'ingestion');

      const entries: IndexEntry[] = chunks.map((chunk, i) => ({
        chunkId: chunk.id,
        documentId,
        ordinal: chunk.ordinal,
        content: chunk.content,
        vector: vectors[i],
        metadata: { ...document.metadata, filename: document.filename },
      }));

      timer.mark('upsert');
      await this.index.upsert(entries);
      logIngestionStep(log, 'upsert', { duration_ms: timer.measure('upsert'), chunks: entries.length });

      // Chunks from an earlier, longer version of the document
      timer.mark('prune');
      const pruned = await this.index.delete(documentId, { exceptChunkIds: entries.map((e) => e.chunkId) });
      logIngestionStep(log, 'prune', { duration_ms: timer.measure('prune'), chunks: pruned });

      await this.documents.setStatus(documentId, 'ready', { chunkCount: chunks.length, errorMessage: null });
    } catch (error) {
      await this.markFailed(documentId, error);
      throw error;
    }

    log.info(
      { event: 'document_ingested', documentId, chunks: chunks.length, duration_ms: timer.elapsed() },
      `Ingested ${document.filename}`
    );
    return { documentId, chunkCount: chunks.length };
  }

  private async markFailed(documentId: string, error: unknown): Promise<void> {
    logIngestionStep(log, 'store', { error: getErrorMessage(error) });

    try {
      await this.documents.setStatus(documentId, 'error', { errorMessage: getErrorMessage(error) });
    } catch (statusError) {
      log.error(
        { event: 'status_update_failed', documentId, error: getErrorMessage(statusError) },
        'Could not mark document as failed'
      );
    }
  }

  // ===========================================================================
  // Chat
  // ===========================================================================

  /**
   * Answer a question. The exchange is appended to the session afterwards.
   */
  async chat(request: EngineChatRequest): Promise<ChatResponse> {
    if (!request.query.trim()) {
      throw new InvalidRequestError('Query must not be empty');
    }

    const history = request.history ?? (await this.sessions.getHistory(request.sessionId));
    const response = await this.orchestrator.chat({
      query: request.query,
      history,
      mode: request.mode ?? 'rag',
      sessionId: request.sessionId,
      filter: request.filter,
      topK: request.topK,
      signal: request.signal,
    });

    await this.remember(request.sessionId, request.query, response.answer);
    return response;
  }

  /**
   * Streaming variant of chat(). Errors are delivered to `onError`,
   * including session storage failures; the returned promise always resolves.
   */
  async chatStream(request: EngineChatRequest, callbacks: ChatStreamCallbacks): Promise<void> {
    if (!request.query.trim()) {
      callbacks.onError?.(new InvalidRequestError('Query must not be empty'));
      return;
    }

    const result: { response?: ChatResponse } = {};
    let history: ConversationTurn[];
    try {
      history = request.history ?? (await this.sessions.getHistory(request.sessionId));
    } catch (error) {
      this.reportSessionError(callbacks, 'read', request.sessionId, error);
      return;
    }

    await this.orchestrator.chatStream(
      {
        query: request.query,
        history,
        mode: request.mode ?? 'rag',
        sessionId: request.sessionId,
        filter: request.filter,
        topK: request.topK,
        signal: request.signal,
      },
      {
        onStatus: callbacks.onStatus,
        onChunk: callbacks.onChunk,
        onError: callbacks.onError,
        onComplete: (response) => {
          result.response = response;
        },
      }
    );

    if (!result.response) return;

    try {
      await this.remember(request.sessionId, request.query, result.response.answer);
    } catch (error) {
      this.reportSessionError(callbacks, 'write', request.sessionId, error);
      return;
    }
    callbacks.onComplete?.(result.response);
  }

  private reportSessionError(
    callbacks: ChatStreamCallbacks,
    operation: 'read' | 'write',
    sessionId: string,
    error: unknown
  ): void {
    log.error(
      { event: 'session_failed', operation, sessionId, error: getErrorMessage(error) },
      `Session ${operation} failed`
    );
    callbacks.onError?.(error instanceof Error ? error : new Error(String(error)));
  }

  async clearSession(sessionId: string): Promise<void> {
    await this.sessions.clear(sessionId);
  }

  private async remember(sessionId: string, question: string, answer: string): Promise<void> {
    await this.sessions.append(sessionId, [
      { role: 'user', content: question },
      { role: 'assistant', content: answer },
    ]);
  }

  // ===========================================================================
  // Documents
  // ===========================================================================

  /**
   * Remove a document and its index entries. Unknown ids are a no-op.
   */
  async deleteDocument(documentId: string): Promise<DeleteResult> {
    const remove = async () => {
      const removedEntries = await this.index.delete(documentId);
      const existed = await this.documents.delete(documentId);
      log.info(
        { event: 'document_deleted', documentId, removedEntries, existed },
        `Deleted document ${documentId}`
      );
      return { removedEntries };
    };

    return this.policy === 'none' ? remove() : this.locks.run(documentId, remove);
  }

  async listDocuments(): Promise<StoredDocument[]> {
    return this.documents.list();
  }

  async getDocument(documentId: string): Promise<StoredDocument | null> {
    return this.documents.get(documentId);
  }

  // ===========================================================================
  // Curated Answers
  // ===========================================================================

  /**
   * Store an approved answer. Its question is embedded so later chats can
   * match it.
   *
   * @throws ConfigurationError when the engine has no curated answer store
   */
  async addCuratedAnswer(input: CuratedAnswerInput, signal?: AbortSignal): Promise<CuratedAnswer> {
    const store = this.requireCurated();
    const question = input.question.trim();
    const answer = input.answer.trim();
    if (!question || !answer) {
      throw new InvalidRequestError('Curated question and answer must not be empty');
    }

    const vector = await this.embedder.embedQuery(question, { signal });
    const curated: CuratedAnswer = {
      id: input.id ?? randomUUID(),
      question,
      answer,
      metadata: input.metadata ?? {},
      createdAt: new Date(),
    };
    await store.upsert(curated, vector);

    log.info({ event: 'curated_added', id: curated.id }, 'Stored curated answer');
    return curated;
  }

  async listCuratedAnswers(): Promise<CuratedAnswer[]> {
    return this.requireCurated().list();
  }

  async deleteCuratedAnswer(id: string): Promise<boolean> {
    const removed = await this.requireCurated().delete(id);
    log.info({ event: 'curated_deleted', id, removed }, `Deleted curated answer ${id}`);
    return removed;
  }

  private requireCurated(): CuratedAnswerStore {
    if (!this.curated) {
      throw new ConfigurationError('No curated answer store is configured');
    }
    return this.curated;
  }

  /** Entry count, for diagnostics */
  async countEntries(documentId?: string): Promise<number> {
    return this.index.count(documentId);
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export interface RAGEngineHandle {
  engine: RAGEngine;
  /** Release database connections, if any */
  close(): Promise<void>;
}

export interface RAGEngineOverrides {
  /** Replaces the OpenAI adapter for both embeddings and generation */
  llm?: Pick<LLMAdapter, 'complete' | 'streamComplete' | 'embedBatch'>;
}

/**
 * Wire an engine from configuration: OpenAI adapters plus the configured
 * vector store.
 *
 * @throws ConfigurationError when the API key or database URL is missing
 */
export function createRAGEngineFromConfig(config: RAGConfig, overrides: RAGEngineOverrides = {}): RAGEngineHandle {
  const llm = overrides.llm ?? createLLMAdapterFromConfig(config);

  const pipeline = new IngestionPipeline(config.chunking);
  const embedder = createEmbeddingService(llm, config);

  let index: VectorIndex;
  let documents: DocumentStore;
  let sessions: SessionStore;
  let curated: CuratedAnswerStore;
  let close = async (): Promise<void> => undefined;

  if (config.vectorStore === 'pgvector') {
    if (!config.databaseUrl) {
      throw new ConfigurationError('DATABASE_URL is required when VECTOR_STORE=pgvector');
    }
    const connection = createDb(config.databaseUrl);
    index = new PgVectorIndex(connection.db, {
      dimensions: config.embedding.dimensions,
      timeoutMs: config.retrieval.indexTimeoutMs,
    });
    documents = new PgDocumentStore(connection.db, config.retrieval.indexTimeoutMs);
    sessions = new PgSessionStore(connection.db, {
      ...config.sessions,
      timeoutMs: config.retrieval.indexTimeoutMs,
    });
    curated = new PgCuratedAnswerStore(connection.db, {
      dimensions: config.embedding.dimensions,
      timeoutMs: config.retrieval.indexTimeoutMs,
    });
    close = connection.close;
  } else {
    index = new InMemoryVectorIndex(config.embedding.dimensions);
    documents = new InMemoryDocumentStore();
    sessions = new InMemorySessionStore(config.sessions);
    curated = new InMemoryCuratedAnswerStore(config.embedding.dimensions);
  }

  log.info(
    {
      event: 'engine_created',
      vectorStore: config.vectorStore,
      embeddingModel: config.embedding.model,
      llmModel: config.openai.model,
      policy: config.ingestionConcurrencyPolicy,
    },
    'RAG engine ready'
  );

  const engine = new RAGEngine({
    pipeline,
    embedder,
    index,
    documents,
    sessions,
    generator: llm,
    orchestrator: toOrchestratorConfig(config),
    curated,
    ingestionConcurrencyPolicy: config.ingestionConcurrencyPolicy,
  });

  return { engine, close };
}
