/**
 * Embedding Service
 *
 * Turns text into vectors through an embedding provider. Inputs are sent
 * in ordered batches; every batch call is time-boxed and retried with
 * exponential backoff on transient failures.
 */

import type { LLMAdapter } from '@/types/llm';
import type { EmbeddingVector } from '@/types/rag';
import {
  EmbeddingProviderError,
  RateLimitedError,
  getErrorMessage,
  getErrorStatus,
  isRAGError,
  isTransientProviderError,
  type RAGError,
} from '@/lib/errors';
import { loggers, logExternalCall, Timer } from '@/lib/logger';
import { withRetry } from '@/lib/utils/retry';
import { withTimeout } from '@/lib/utils/timeout';
import {
  DEFAULT_EMBEDDING_BATCH_SIZE,
  DEFAULT_EMBEDDING_DIMENSIONS,
  DEFAULT_EMBEDDING_MAX_ATTEMPTS,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_EMBEDDING_TIMEOUT_MS,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  MAX_EMBEDDING_BATCH_SIZE,
  type RAGConfig,
} from './config';

const log = loggers.embedding.child({ service: 'EmbeddingService' });

// =============================================================================
// Types
// =============================================================================

export interface EmbedOptions {
  signal?: AbortSignal;
}

/**
 * Text → vector port used by ingestion and retrieval.
 */
export interface Embedder {
  readonly model: string;
  readonly dimensions: number;
  /** One vector per input, in input order */
  embedBatch(texts: string[], options?: EmbedOptions): Promise<EmbeddingVector[]>;
  embedQuery(text: string, options?: EmbedOptions): Promise<EmbeddingVector>;
}

/**
 * The slice of an LLM adapter the service needs.
 */
export type EmbeddingProvider = Pick<LLMAdapter, 'embedBatch'>;

export interface EmbeddingConfig {
  model: string;
  dimensions: number;
  batchSize: number;
  maxAttempts: number;
  timeoutMs: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: boolean;
}

const DEFAULT_EMBEDDING_CONFIG: EmbeddingConfig = {
  model: DEFAULT_EMBEDDING_MODEL,
  dimensions: DEFAULT_EMBEDDING_DIMENSIONS,
  batchSize: DEFAULT_EMBEDDING_BATCH_SIZE,
  maxAttempts: DEFAULT_EMBEDDING_MAX_ATTEMPTS,
  timeoutMs: DEFAULT_EMBEDDING_TIMEOUT_MS,
  baseDelayMs: DEFAULT_RETRY_BASE_DELAY_MS,
  maxDelayMs: DEFAULT_RETRY_MAX_DELAY_MS,
  jitter: true,
};

// =============================================================================
// Embedding Service Class
// =============================================================================

export class EmbeddingService implements Embedder {
  readonly model: string;
  readonly dimensions: number;
  private readonly config: EmbeddingConfig;

  constructor(
    private readonly provider: EmbeddingProvider,
    config: Partial<EmbeddingConfig> = {}
  ) {
    this.config = { ...DEFAULT_EMBEDDING_CONFIG, ...config };
    this.config.batchSize = Math.max(1, Math.min(this.config.batchSize, MAX_EMBEDDING_BATCH_SIZE));
    this.model = this.config.model;
    this.dimensions = this.config.dimensions;
  }

  /**
   * Embed texts in batches of at most `batchSize`, one batch at a time.
   *
   * @throws EmbeddingProviderError for blank inputs, provider failures or wrong dimensions
   * @throws RateLimitedError when attempts run out on HTTP 429
   */
  async embedBatch(texts: string[], options: EmbedOptions = {}): Promise<EmbeddingVector[]> {
    if (texts.length === 0) {
      return [];
    }

    const blankIndex = texts.findIndex((text) => !text.trim());
    if (blankIndex !== -1) {
      throw new EmbeddingProviderError(`Cannot generate embedding for empty text (input ${blankIndex})`);
    }

    const vectors: EmbeddingVector[] = [];
    for (let offset = 0; offset < texts.length; offset += this.config.batchSize) {
      const batch = texts.slice(offset, offset + this.config.batchSize);
      vectors.push(...(await this.embedOneBatch(batch, offset, options.signal)));
    }

    return vectors;
  }

  async embedQuery(text: string, options: EmbedOptions = {}): Promise<EmbeddingVector> {
    const [vector] = await this.embedBatch([text], options);
    if (!vector) {
      throw new EmbeddingProviderError('Provider returned no embedding for the query');
    }
    return vector;
  }

  private async embedOneBatch(
    batch: string[],
    offset: number,
    signal: AbortSignal | undefined
  ): Promise<EmbeddingVector[]> {
    const timer = new Timer();

    try {
      const results = await withRetry(
        () =>
          withTimeout(
            this.provider.embedBatch(batch, {
              model: this.model,
              dimensions: this.dimensions,
              signal,
            }),
            { timeoutMs: this.config.timeoutMs, operation: 'embedding', signal }
          ),
        {
          maxAttempts: this.config.maxAttempts,
          baseDelayMs: this.config.baseDelayMs,
          maxDelayMs: this.config.maxDelayMs,
          jitter: this.config.jitter,
          signal,
          shouldRetry: isTransientProviderError,
          onRetry: (error, attempt, delayMs) =>
            log.warn(
              {
                event: 'embedding_retry',
                attempt,
                maxAttempts: this.config.maxAttempts,
                delay_ms: delayMs,
                status: getErrorStatus(error),
                error: getErrorMessage(error),
              },
              `Embedding attempt ${attempt}/${this.config.maxAttempts} failed, retrying in ${delayMs}ms`
            ),
        }
      );

      if (results.length !== batch.length) {
        throw new EmbeddingProviderError(
          `Provider returned ${results.length} embeddings for ${batch.length} inputs`
        );
      }

      const vectors = results.map((result, i) => {
        if (result.embedding.length !== this.dimensions) {
          throw new EmbeddingProviderError(
            `Embedding for input ${offset + i} has ${result.embedding.length} dimensions, expected ${this.dimensions}`
          );
        }
        return result.embedding;
      });

      logExternalCall(log, 'openai', 'embeddings', {
        duration_ms: timer.elapsed(),
        model: this.model,
        tokens: results.reduce((sum, r) => sum + r.usage.totalTokens, 0),
      });

      return vectors;
    } catch (error) {
      const mapped = toEmbeddingError(error);
      logExternalCall(log, 'openai', 'embeddings', {
        duration_ms: timer.elapsed(),
        model: this.model,
        status: getErrorStatus(error),
        error: mapped.message,
      });
      throw mapped;
    }
  }
}

/**
 * Translate a provider failure into the embedding error kinds.
 */
export function toEmbeddingError(error: unknown): RAGError {
  if (isRAGError(error)) {
    return error;
  }

  const status = getErrorStatus(error);
  if (status === 429) {
    return new RateLimitedError(`Embedding provider rate limit: ${getErrorMessage(error)}`, {
      cause: error,
      context: { status },
    });
  }

  return new EmbeddingProviderError(`Embedding provider failed: ${getErrorMessage(error)}`, {
    cause: error,
    context: { status },
  });
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Create an EmbeddingService from resolved RAG configuration.
 */
export function createEmbeddingService(provider: EmbeddingProvider, config: RAGConfig): EmbeddingService {
  return new EmbeddingService(provider, {
    model: config.embedding.model,
    dimensions: config.embedding.dimensions,
    batchSize: config.embedding.batchSize,
    maxAttempts: config.embedding.maxAttempts,
    timeoutMs: config.embedding.timeoutMs,
    baseDelayMs: config.retry.baseDelayMs,
    maxDelayMs: config.retry.maxDelayMs,
  });
}
