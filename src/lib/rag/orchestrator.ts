/**
 * Chat Orchestrator
 *
 * Runs one chat request through the pipeline:
 * 1. Rewrite a follow-up question into a standalone search query
 * 2. Embed the query
 * 3. Answer from a curated question/answer pair when one matches closely
 * 4. Otherwise retrieve the most similar chunks
 * 5. Assemble a prompt that fits the character budget
 * 6. Generate the answer (retried, time-boxed)
 * 7. Map citations back to chunks
 *
 * Each run walks the states ReceivedQuery → Embedding → Retrieving →
 * PromptAssembly → Generating → Responded, or ends in Failed. A curated
 * answer goes from Embedding straight to Responded.
 */

import type {
  ChatMode,
  ConversationTurn,
  OrchestratorState,
  QueryFilter,
  ScoredCuratedAnswer,
  ScoredEntry,
} from '@/types/rag';
import type { LLMAdapter, LLMMessage, LLMCompletionResponse, TokenUsage } from '@/types/llm';
import {
  CancelledError,
  GenerationUnavailableError,
  InvalidRequestError,
  RetrievalUnavailableError,
  getErrorMessage,
  isRAGError,
} from '@/lib/errors';
import {
  createLayerLogger,
  createRequestContext,
  logRagStep,
  Timer,
  type Logger,
  type TimingInfo,
} from '@/lib/logger';
import { throwIfAborted, withRetry } from '@/lib/utils/retry';
import { withTimeout } from '@/lib/utils/timeout';
import { parseCitations, validateCitations, type Citation } from './citations';
import { assemblePrompt, type AssembledPrompt } from './prompt-builder';
import type { Embedder } from './embeddings';
import type { CuratedAnswerStore } from './curated-answers';
import { rewriteQuery } from './query-rewriter';
import type { VectorIndex } from './vector-index';
import type { RAGConfig } from './config';

// =============================================================================
// Types
// =============================================================================

/**
 * The slice of an LLM adapter used for answers.
 */
export type Generator = Pick<LLMAdapter, 'complete' | 'streamComplete'>;

export interface OrchestratorConfig {
  topK: number;
  /** Applied when above 0 and the request sets none */
  minSimilarity: number;
  maxPromptChars: number;
  maxHistoryTurns: number;
  model: string;
  maxTokens: number;
  temperature: number;
  generationTimeoutMs: number;
  generationMaxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  /** Rewrite follow-ups from history before retrieval */
  queryRewrite: boolean;
  /** Curated answers must score above this */
  curatedMinSimilarity: number;
}

export interface ChatRequest {
  query: string;
  history: ConversationTurn[];
  mode: ChatMode;
  sessionId?: string;
  filter?: QueryFilter;
  /** Overrides the configured topK */
  topK?: number;
  signal?: AbortSignal;
}

export interface ChatSource {
  chunkId: string;
  documentId: string;
  similarity: number;
}

export interface CuratedMatch {
  id: string;
  question: string;
  similarity: number;
}

export interface ChatResponse {
  answer: string;
  sources: ChatSource[];
  citations: Citation[];
  mode: ChatMode;
  /** True when `auto` fell back to chat without retrieval */
  degraded: boolean;
  /** Set when a curated answer was returned instead of a generated one */
  curated: CuratedMatch | null;
  /** The query used for retrieval, after rewriting */
  searchQuery: string;
  trace: OrchestratorState[];
  timing: TimingInfo;
  usage: TokenUsage;
}

export type ChatStatus = 'retrieving' | 'generating';

export interface ChatStreamCallbacks {
  onStatus?: (status: ChatStatus) => void;
  onChunk?: (chunk: string) => void;
  onComplete?: (response: ChatResponse) => void;
  onError?: (error: Error) => void;
}

// =============================================================================
// State Tracking
// =============================================================================

export const ALLOWED_TRANSITIONS: Record<OrchestratorState, readonly OrchestratorState[]> = {
  ReceivedQuery: ['Embedding', 'Generating', 'Failed'],
  Embedding: ['Retrieving', 'Generating', 'Responded', 'Failed'],
  Retrieving: ['PromptAssembly', 'Generating', 'Failed'],
  PromptAssembly: ['Generating', 'Failed'],
  Generating: ['Responded', 'Failed'],
  Responded: [],
  Failed: [],
};

/**
 * Records the states one request passes through.
 */
export class RunTrace {
  private readonly states: OrchestratorState[] = ['ReceivedQuery'];

  constructor(readonly log: Logger) {}

  get current(): OrchestratorState {
    return this.states[this.states.length - 1];
  }

  get isTerminal(): boolean {
    return ALLOWED_TRANSITIONS[this.current].length === 0;
  }

  transition(next: OrchestratorState): void {
    const from = this.current;
    if (!ALLOWED_TRANSITIONS[from].includes(next)) {
      throw new Error(`Invalid orchestrator transition ${from} -> ${next}`);
    }
    this.states.push(next);
    this.log.debug({ event: 'state_transition', from, to: next }, `${from} -> ${next}`);
  }

  /** Move to Failed unless already terminal */
  fail(): void {
    if (!this.isTerminal) this.transition('Failed');
  }

  toArray(): OrchestratorState[] {
    return [...this.states];
  }
}

type PreparedRun =
  | { kind: 'curated'; answer: ScoredCuratedAnswer; searchQuery: string }
  | { kind: 'generate'; prompt: AssembledPrompt; degraded: boolean; searchQuery: string };

type Retrieved =
  | { kind: 'curated'; answer: ScoredCuratedAnswer }
  | { kind: 'chunks'; chunks: ScoredEntry[] };

const EMPTY_USAGE: TokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

// =============================================================================
// Orchestrator Class
// =============================================================================

export class ChatOrchestrator {
  constructor(
    private readonly embedder: Embedder,
    private readonly index: VectorIndex,
    private readonly generator: Generator,
    private readonly config: OrchestratorConfig,
    private readonly curated?: CuratedAnswerStore
  ) {}

  /**
   * Answer one question.
   *
   * @throws InvalidRequestError for an empty query
   * @throws RetrievalUnavailableError when retrieval fails in `rag` mode
   * @throws GenerationUnavailableError when every generation attempt fails
   * @throws CancelledError when the signal aborts
   */
  async chat(request: ChatRequest): Promise<ChatResponse> {
    const ctx = createRequestContext({ sessionId: request.sessionId });
    const log = createLayerLogger('rag', ctx);
    const timer = new Timer();
    const run = new RunTrace(log);

    try {
      const prepared = await this.prepare(request, run, timer, log);
      if (prepared.kind === 'curated') {
        const response = this.respondCurated(request, run, prepared.answer, prepared.searchQuery, timer, ctx.traceId);
        log.info(
          { event: 'chat_complete', mode: request.mode, curated: prepared.answer.id, ...response.timing },
          'Chat request answered from a curated answer'
        );
        return response;
      }

      run.transition('Generating');
      const completion = await this.generate(prepared.prompt.messages, request.signal, timer, log);

      const response = this.respond(
        request,
        run,
        prepared,
        completion.content,
        completion.usage,
        timer,
        ctx.traceId
      );
      log.info(
        {
          event: 'chat_complete',
          mode: request.mode,
          degraded: prepared.degraded,
          sources: response.sources.length,
          citations: response.citations.length,
          ...response.timing,
        },
        'Chat request answered'
      );
      return response;
    } catch (error) {
      run.fail();
      log.error(
        {
          event: 'chat_failed',
          mode: request.mode,
          kind: isRAGError(error) ? error.kind : 'Internal',
          trace: run.toArray(),
        },
        `Chat request failed: ${getErrorMessage(error)}`
      );
      throw error;
    }
  }

  /**
   * Answer one question, streaming the generated text.
   * Errors go to `onError`; the returned promise always resolves.
   */
  async chatStream(request: ChatRequest, callbacks: ChatStreamCallbacks): Promise<void> {
    const ctx = createRequestContext({ sessionId: request.sessionId });
    const log = createLayerLogger('rag', ctx);
    const timer = new Timer();
    const run = new RunTrace(log);

    try {
      if (request.mode !== 'simple') callbacks.onStatus?.('retrieving');
      const prepared = await this.prepare(request, run, timer, log);
      if (prepared.kind === 'curated') {
        const response = this.respondCurated(request, run, prepared.answer, prepared.searchQuery, timer, ctx.traceId);
        callbacks.onChunk?.(response.answer);
        callbacks.onComplete?.(response);
        return;
      }

      run.transition('Generating');
      callbacks.onStatus?.('generating');
      const { content, usage } = await this.generateStream(
        prepared.prompt.messages,
        request.signal,
        timer,
        log,
        callbacks
      );

      const response = this.respond(request, run, prepared, content, usage, timer, ctx.traceId);
      callbacks.onComplete?.(response);
    } catch (error) {
      run.fail();
      log.error(
        { event: 'chat_stream_failed', mode: request.mode, trace: run.toArray() },
        `Chat stream failed: ${getErrorMessage(error)}`
      );
      callbacks.onError?.(error instanceof Error ? error : new Error(String(error)));
    }
  }

  // ===========================================================================
  // Steps
  // ===========================================================================

  private async prepare(request: ChatRequest, run: RunTrace, timer: Timer, log: Logger): Promise<PreparedRun> {
    if (!request.query.trim()) {
      throw new InvalidRequestError('Query must not be empty');
    }
    throwIfAborted(request.signal, 'chat');

    let chunks: ScoredEntry[] | null = null;
    let degraded = false;
    let searchQuery = request.query;

    if (request.mode !== 'simple') {
      try {
        searchQuery = await this.toSearchQuery(request, timer, log);
        const retrieved = await this.retrieve(request, searchQuery, run, timer, log);
        if (retrieved.kind === 'curated') {
          return { kind: 'curated', answer: retrieved.answer, searchQuery };
        }
        chunks = retrieved.chunks;
      } catch (error) {
        if (isRAGError(error, 'Cancelled')) throw error;

        const originKind = isRAGError(error) ? error.kind : undefined;
        if (request.mode === 'auto') {
          log.warn(
            { event: 'retrieval_degraded', originKind, error: getErrorMessage(error) },
            'Retrieval failed, answering without documents'
          );
          degraded = true;
        } else {
          throw new RetrievalUnavailableError(`Retrieval failed: ${getErrorMessage(error)}`, {
            cause: error,
            originKind,
          });
        }
      }
    }

    if (chunks !== null) run.transition('PromptAssembly');

    timer.mark('prompt');
    const prompt = assemblePrompt({
      question: request.query,
      history: request.history,
      chunks,
      budget: { maxPromptChars: this.config.maxPromptChars, maxHistoryTurns: this.config.maxHistoryTurns },
    });
    logRagStep(log, 'prompt', {
      duration_ms: timer.measure('prompt'),
      chars: prompt.promptChars,
      chunks: prompt.contexts.length,
      droppedTurns: prompt.droppedTurns,
      droppedChunks: prompt.droppedChunks,
    });
    if (prompt.overBudget) {
      log.warn(
        { event: 'prompt_over_budget', chars: prompt.promptChars, maxChars: this.config.maxPromptChars },
        'Prompt exceeds the budget with only the question left'
      );
    }

    throwIfAborted(request.signal, 'chat');
    return { kind: 'generate', prompt, degraded, searchQuery };
  }

  private async toSearchQuery(request: ChatRequest, timer: Timer, log: Logger): Promise<string> {
    if (!this.config.queryRewrite || request.history.length === 0) {
      return request.query;
    }

    timer.mark('rewrite');
    const searchQuery = await rewriteQuery(this.generator, request.query, request.history, {
      model: this.config.model,
      timeoutMs: this.config.generationTimeoutMs,
      signal: request.signal,
    });
    logRagStep(log, 'rewrite', { duration_ms: timer.measure('rewrite'), chars: searchQuery.length });
    return searchQuery;
  }

  private async retrieve(
    request: ChatRequest,
    searchQuery: string,
    run: RunTrace,
    timer: Timer,
    log: Logger
  ): Promise<Retrieved> {
    run.transition('Embedding');
    timer.mark('embedding');
    const vector = await this.embedder.embedQuery(searchQuery, { signal: request.signal });
    logRagStep(log, 'embedding', { duration_ms: timer.measure('embedding'), model: this.embedder.model });

    throwIfAborted(request.signal, 'chat');
    const curated = await this.matchCurated(vector, request, timer, log);
    if (curated) {
      return { kind: 'curated', answer: curated };
    }

    run.transition('Retrieving');
    timer.mark('retrieval');

    const filter: QueryFilter = { ...request.filter };
    if (filter.minSimilarity === undefined && this.config.minSimilarity > 0) {
      filter.minSimilarity = this.config.minSimilarity;
    }

    const entries = await withTimeout(this.index.query(vector, request.topK ?? this.config.topK, filter), {
      operation: 'retrieval',
      signal: request.signal,
    });
    logRagStep(log, 'retrieval', { duration_ms: timer.measure('retrieval'), chunks: entries.length });

    return { kind: 'chunks', chunks: entries };
  }

  /**
   * Best curated answer above the threshold. Skipped when the request is
   * limited to specific documents. A lookup failure falls through to
   * document retrieval.
   */
  private async matchCurated(
    vector: number[],
    request: ChatRequest,
    timer: Timer,
    log: Logger
  ): Promise<ScoredCuratedAnswer | null> {
    if (!this.curated || request.filter?.documentIds) {
      return null;
    }

    timer.mark('curated');
    try {
      const match = await withTimeout(this.curated.match(vector, this.config.curatedMinSimilarity), {
        operation: 'curated match',
        signal: request.signal,
      });
      logRagStep(log, 'curated', { duration_ms: timer.measure('curated'), similarity: match?.similarity });
      return match;
    } catch (error) {
      if (isRAGError(error, 'Cancelled')) throw error;

      timer.measure('curated');
      log.warn(
        { event: 'curated_match_failed', error: getErrorMessage(error) },
        'Curated answer lookup failed, searching documents'
      );
      return null;
    }
  }

  private async generate(
    messages: LLMMessage[],
    signal: AbortSignal | undefined,
    timer: Timer,
    log: Logger
  ): Promise<LLMCompletionResponse> {
    timer.mark('generation');

    try {
      const completion = await withRetry(
        () =>
          withTimeout(
            this.generator.complete(messages, {
              model: this.config.model,
              maxTokens: this.config.maxTokens,
              temperature: this.config.temperature,
              signal,
            }),
            { timeoutMs: this.config.generationTimeoutMs, operation: 'generation', signal }
          ),
        {
          maxAttempts: this.config.generationMaxAttempts,
          baseDelayMs: this.config.retryBaseDelayMs,
          maxDelayMs: this.config.retryMaxDelayMs,
          signal,
          shouldRetry: (error) => !isRAGError(error),
          onRetry: (error, attempt) =>
            log.warn(
              { event: 'generation_retry', attempt, error: getErrorMessage(error) },
              `Generation attempt ${attempt} failed, retrying`
            ),
        }
      );

      logRagStep(log, 'generation', {
        duration_ms: timer.measure('generation'),
        tokens: completion.usage.totalTokens,
        model: this.config.model,
      });
      return completion;
    } catch (error) {
      throw this.toGenerationError(error, timer, log);
    }
  }

  /**
   * Streamed generation. A failure before the first token is retried;
   * once text has been emitted it is not.
   */
  private async generateStream(
    messages: LLMMessage[],
    signal: AbortSignal | undefined,
    timer: Timer,
    log: Logger,
    callbacks: ChatStreamCallbacks
  ): Promise<{ content: string; usage: TokenUsage }> {
    timer.mark('generation');
    let started = false;

    const consume = async (isCurrent: () => boolean) => {
      let content = '';
      let usage = EMPTY_USAGE;
      const stream = this.generator.streamComplete(messages, {
        model: this.config.model,
        maxTokens: this.config.maxTokens,
        temperature: this.config.temperature,
        signal,
      });

      for await (const chunk of stream) {
        if (!isCurrent()) break;
        if (chunk.content) {
          started = true;
          content += chunk.content;
          callbacks.onChunk?.(chunk.content);
        }
        if (chunk.usage) usage = chunk.usage;
      }
      return { content, usage };
    };

    try {
      const result = await withRetry(
        async () => {
          // A timed-out attempt must stop emitting chunks
          let expired = false;
          try {
            return await withTimeout(consume(() => !expired), {
              timeoutMs: this.config.generationTimeoutMs,
              operation: 'generation',
              signal,
            });
          } finally {
            expired = true;
          }
        },
        {
          maxAttempts: this.config.generationMaxAttempts,
          baseDelayMs: this.config.retryBaseDelayMs,
          maxDelayMs: this.config.retryMaxDelayMs,
          signal,
          shouldRetry: (error) => !started && !isRAGError(error),
        }
      );

      logRagStep(log, 'generation', {
        duration_ms: timer.measure('generation'),
        tokens: result.usage.totalTokens,
        model: this.config.model,
      });
      return result;
    } catch (error) {
      throw this.toGenerationError(error, timer, log);
    }
  }

  private toGenerationError(error: unknown, timer: Timer, log: Logger): Error {
    logRagStep(log, 'generation', { duration_ms: timer.measure('generation'), error: getErrorMessage(error) });

    if (isRAGError(error, 'Cancelled')) return error;
    return new GenerationUnavailableError(`Generation failed: ${getErrorMessage(error)}`, {
      cause: error,
      originKind: isRAGError(error) ? error.kind : undefined,
    });
  }

  private respond(
    request: ChatRequest,
    run: RunTrace,
    prepared: Extract<PreparedRun, { kind: 'generate' }>,
    answer: string,
    usage: TokenUsage,
    timer: Timer,
    traceId: string
  ): ChatResponse {
    if (request.signal?.aborted) {
      throw new CancelledError('chat cancelled', { cause: request.signal.reason });
    }

    const { prompt } = prepared;
    const citations = parseCitations(answer, prompt.contexts);
    const check = validateCitations(answer, prompt.contexts);
    logRagStep(run.log, 'citation', { chunks: citations.length, invalidCitations: check.invalidCitations });
    if (!check.isValid) {
      run.log.warn(
        { event: 'citation_invalid', invalidCitations: check.invalidCitations, contexts: prompt.contexts.length },
        'Answer cites chunks that were not in the prompt'
      );
    }

    run.transition('Responded');

    return {
      answer,
      sources: prompt.contexts.map((c) => ({ chunkId: c.chunkId, documentId: c.documentId, similarity: c.similarity })),
      citations,
      mode: request.mode,
      degraded: prepared.degraded,
      curated: null,
      searchQuery: prepared.searchQuery,
      trace: run.toArray(),
      timing: timer.toTimingInfo(traceId),
      usage,
    };
  }

  private respondCurated(
    request: ChatRequest,
    run: RunTrace,
    match: ScoredCuratedAnswer,
    searchQuery: string,
    timer: Timer,
    traceId: string
  ): ChatResponse {
    if (request.signal?.aborted) {
      throw new CancelledError('chat cancelled', { cause: request.signal.reason });
    }

    run.transition('Responded');

    return {
      answer: match.answer,
      sources: [],
      citations: [],
      mode: request.mode,
      degraded: false,
      curated: { id: match.id, question: match.question, similarity: match.similarity },
      searchQuery,
      trace: run.toArray(),
      timing: timer.toTimingInfo(traceId),
      usage: EMPTY_USAGE,
    };
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function toOrchestratorConfig(config: RAGConfig): OrchestratorConfig {
  return {
    topK: config.retrieval.topK,
    minSimilarity: config.retrieval.minSimilarity,
    maxPromptChars: config.generation.maxPromptChars,
    maxHistoryTurns: config.generation.maxHistoryTurns,
    model: config.openai.model,
    maxTokens: config.generation.maxTokens,
    temperature: config.generation.temperature,
    generationTimeoutMs: config.generation.timeoutMs,
    generationMaxAttempts: config.generation.maxAttempts,
    retryBaseDelayMs: config.retry.baseDelayMs,
    retryMaxDelayMs: config.retry.maxDelayMs,
    queryRewrite: config.retrieval.queryRewrite,
    curatedMinSimilarity: config.retrieval.curatedMinSimilarity,
  };
}
