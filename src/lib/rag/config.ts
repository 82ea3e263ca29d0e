/**
 * RAG Configuration
 *
 * Documented defaults for every pipeline parameter, plus a zod schema that
 * reads and validates overrides from the environment.
 */

import { z } from 'zod';
import { ConfigurationError } from '@/lib/errors';

// =============================================================================
// Chunking Configuration
// =============================================================================

/**
 * Default chunk size in characters for document splitting.
 */
export const DEFAULT_CHUNK_SIZE = 1000;

/**
 * Default overlap between consecutive chunks in characters.
 * Keeps sentences that straddle a boundary retrievable from both sides.
 */
export const DEFAULT_CHUNK_OVERLAP = 200;

// =============================================================================
// Embedding Configuration
// =============================================================================

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

export const DEFAULT_EMBEDDING_DIMENSIONS = 1536;

/**
 * Inputs per provider request. Capped at the provider limit below.
 */
export const DEFAULT_EMBEDDING_BATCH_SIZE = 100;

/** OpenAI accepts at most 2048 inputs per embeddings request */
export const MAX_EMBEDDING_BATCH_SIZE = 2048;

export const DEFAULT_EMBEDDING_MAX_ATTEMPTS = 3;

export const DEFAULT_EMBEDDING_TIMEOUT_MS = 15000;

// =============================================================================
// Retry Configuration
// =============================================================================

/** First backoff delay; doubles per attempt */
export const DEFAULT_RETRY_BASE_DELAY_MS = 500;

export const DEFAULT_RETRY_MAX_DELAY_MS = 8000;

// =============================================================================
// Retrieval Configuration
// =============================================================================

/**
 * Default number of chunks to retrieve from vector search.
 */
export const DEFAULT_TOP_K = 5;

/**
 * Chunks below this cosine similarity are ignored. 0 keeps everything
 * that points the same general direction as the query.
 */
export const DEFAULT_MIN_SIMILARITY = 0;

export const DEFAULT_INDEX_TIMEOUT_MS = 10000;

/**
 * A curated answer is returned verbatim when its question scores above this.
 */
export const DEFAULT_CURATED_MIN_SIMILARITY = 0.8;

// =============================================================================
// Query Rewriting Configuration
// =============================================================================

/**
 * Rewrite follow-up questions into standalone search queries using the
 * session history before retrieval.
 */
export const DEFAULT_QUERY_REWRITE = true;

export const QUERY_REWRITE_MAX_TOKENS = 100;

/** Deterministic rewrites */
export const QUERY_REWRITE_TEMPERATURE = 0;

/** History turns shown to the rewriter */
export const QUERY_REWRITE_HISTORY_TURNS = 6;

// =============================================================================
// Prompt & Generation Configuration
// =============================================================================

/**
 * Character budget for system + user prompt.
 * Roughly 3k tokens at four characters per token.
 */
export const DEFAULT_MAX_PROMPT_CHARS = 12000;

/**
 * Most recent conversation turns considered for the prompt.
 */
export const DEFAULT_MAX_HISTORY_TURNS = 10;

export const DEFAULT_LLM_MODEL = 'gpt-4o-mini';

/**
 * Default max tokens for RAG response generation.
 */
export const DEFAULT_RAG_MAX_TOKENS = 1024;

/**
 * Default temperature for RAG response generation.
 * Lower values = more focused/deterministic responses.
 */
export const DEFAULT_RAG_TEMPERATURE = 0.3;

export const DEFAULT_GENERATION_TIMEOUT_MS = 60000;

/** One call plus one retry */
export const DEFAULT_GENERATION_MAX_ATTEMPTS = 2;

// =============================================================================
// Session Configuration
// =============================================================================

/**
 * Turns kept per session before trimming kicks in.
 */
export const DEFAULT_SESSION_MAX_TURNS = 40;

/**
 * Turns retained after a session is trimmed.
 */
export const DEFAULT_SESSION_RETAIN_TURNS = 20;

// =============================================================================
// Environment Schema
// =============================================================================

export const INGESTION_POLICIES = ['none', 'serialize', 'reject'] as const;
export type IngestionConcurrencyPolicy = (typeof INGESTION_POLICIES)[number];

export const VECTOR_STORES = ['memory', 'pgvector'] as const;
export type VectorStoreKind = (typeof VECTOR_STORES)[number];

const int = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

const envSchema = z
  .object({
    OPENAI_API_KEY: z.string().min(1).optional(),
    OPENAI_BASE_URL: z.string().url().optional(),
    LLM_MODEL: z.string().min(1).default(DEFAULT_LLM_MODEL),
    EMBEDDING_MODEL: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),
    EMBEDDING_DIMENSIONS: int(DEFAULT_EMBEDDING_DIMENSIONS),
    EMBEDDING_BATCH_SIZE: int(DEFAULT_EMBEDDING_BATCH_SIZE).pipe(
      z.number().max(MAX_EMBEDDING_BATCH_SIZE)
    ),
    EMBEDDING_MAX_ATTEMPTS: int(DEFAULT_EMBEDDING_MAX_ATTEMPTS),
    EMBEDDING_TIMEOUT_MS: int(DEFAULT_EMBEDDING_TIMEOUT_MS),
    RETRY_BASE_DELAY_MS: nonNegativeInt(DEFAULT_RETRY_BASE_DELAY_MS),
    RETRY_MAX_DELAY_MS: nonNegativeInt(DEFAULT_RETRY_MAX_DELAY_MS),
    INDEX_TIMEOUT_MS: int(DEFAULT_INDEX_TIMEOUT_MS),
    GENERATION_TIMEOUT_MS: int(DEFAULT_GENERATION_TIMEOUT_MS),
    GENERATION_MAX_ATTEMPTS: int(DEFAULT_GENERATION_MAX_ATTEMPTS),
    CHUNK_SIZE: int(DEFAULT_CHUNK_SIZE),
    CHUNK_OVERLAP: nonNegativeInt(DEFAULT_CHUNK_OVERLAP),
    RAG_TOP_K: int(DEFAULT_TOP_K),
    RAG_MIN_SIMILARITY: z.coerce.number().min(-1).max(1).default(DEFAULT_MIN_SIMILARITY),
    CURATED_MIN_SIMILARITY: z.coerce.number().min(-1).max(1).default(DEFAULT_CURATED_MIN_SIMILARITY),
    QUERY_REWRITE: flag(DEFAULT_QUERY_REWRITE),
    MAX_PROMPT_CHARS: int(DEFAULT_MAX_PROMPT_CHARS),
    MAX_HISTORY_TURNS: nonNegativeInt(DEFAULT_MAX_HISTORY_TURNS),
    RAG_MAX_TOKENS: int(DEFAULT_RAG_MAX_TOKENS),
    RAG_TEMPERATURE: z.coerce.number().min(0).max(2).default(DEFAULT_RAG_TEMPERATURE),
    INGESTION_CONCURRENCY_POLICY: z.enum(INGESTION_POLICIES).default('serialize'),
    SESSION_MAX_TURNS: int(DEFAULT_SESSION_MAX_TURNS),
    SESSION_RETAIN_TURNS: int(DEFAULT_SESSION_RETAIN_TURNS),
    VECTOR_STORE: z.enum(VECTOR_STORES).default('memory'),
    DATABASE_URL: z.string().min(1).optional(),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CHUNK_OVERLAP'],
        message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
      });
    }
    if (env.SESSION_RETAIN_TURNS > env.SESSION_MAX_TURNS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SESSION_RETAIN_TURNS'],
        message: 'SESSION_RETAIN_TURNS must not exceed SESSION_MAX_TURNS',
      });
    }
    if (env.VECTOR_STORE === 'pgvector' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when VECTOR_STORE=pgvector',
      });
    }
  });

// =============================================================================
// Resolved Config
// =============================================================================

export interface RAGConfig {
  openai: {
    apiKey?: string;
    baseUrl?: string;
    model: string;
  };
  embedding: {
    model: string;
    dimensions: number;
    batchSize: number;
    maxAttempts: number;
    timeoutMs: number;
  };
  retry: {
    baseDelayMs: number;
    maxDelayMs: number;
  };
  chunking: {
    chunkSize: number;
    chunkOverlap: number;
  };
  retrieval: {
    topK: number;
    minSimilarity: number;
    indexTimeoutMs: number;
    /** Curated answers must score above this */
    curatedMinSimilarity: number;
    queryRewrite: boolean;
  };
  generation: {
    maxPromptChars: number;
    maxHistoryTurns: number;
    maxTokens: number;
    temperature: number;
    timeoutMs: number;
    maxAttempts: number;
  };
  sessions: {
    maxTurns: number;
    retainTurns: number;
  };
  ingestionConcurrencyPolicy: IngestionConcurrencyPolicy;
  vectorStore: VectorStoreKind;
  databaseUrl?: string;
}

/**
 * Read and validate RAG configuration from environment variables.
 *
 * Empty strings count as unset so `.env` placeholders fall back to defaults.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadRAGConfig(env: NodeJS.ProcessEnv = process.env): RAGConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid RAG configuration: ${issues}`, { cause: parsed.error });
  }

  const e = parsed.data;
  return {
    openai: { apiKey: e.OPENAI_API_KEY, baseUrl: e.OPENAI_BASE_URL, model: e.LLM_MODEL },
    embedding: {
      model: e.EMBEDDING_MODEL,
      dimensions: e.EMBEDDING_DIMENSIONS,
      batchSize: e.EMBEDDING_BATCH_SIZE,
      maxAttempts: e.EMBEDDING_MAX_ATTEMPTS,
      timeoutMs: e.EMBEDDING_TIMEOUT_MS,
    },
    retry: { baseDelayMs: e.RETRY_BASE_DELAY_MS, maxDelayMs: e.RETRY_MAX_DELAY_MS },
    chunking: { chunkSize: e.CHUNK_SIZE, chunkOverlap: e.CHUNK_OVERLAP },
    retrieval: {
      topK: e.RAG_TOP_K,
      minSimilarity: e.RAG_MIN_SIMILARITY,
      indexTimeoutMs: e.INDEX_TIMEOUT_MS,
      curatedMinSimilarity: e.CURATED_MIN_SIMILARITY,
      queryRewrite: e.QUERY_REWRITE,
    },
    generation: {
      maxPromptChars: e.MAX_PROMPT_CHARS,
      maxHistoryTurns: e.MAX_HISTORY_TURNS,
      maxTokens: e.RAG_MAX_TOKENS,
      temperature: e.RAG_TEMPERATURE,
      timeoutMs: e.GENERATION_TIMEOUT_MS,
      maxAttempts: e.GENERATION_MAX_ATTEMPTS,
    },
    sessions: { maxTurns: e.SESSION_MAX_TURNS, retainTurns: e.SESSION_RETAIN_TURNS },
    ingestionConcurrencyPolicy: e.INGESTION_CONCURRENCY_POLICY,
    vectorStore: e.VECTOR_STORE,
    databaseUrl: e.DATABASE_URL,
  };
}

// =============================================================================
// Composite Default Config
// =============================================================================

/**
 * Defaults with no environment applied.
 */
export const DEFAULT_RAG_CONFIG: RAGConfig = loadRAGConfig({});
