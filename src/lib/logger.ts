/**
 * Structured Logging System
 *
 * Pino-based logging with:
 * - Request tracing via traceId
 * - Environment-based configuration
 * - Sensitive data sanitization
 * - Layer-specific child loggers
 * - Timing utilities
 */

import pino, { type Logger, type LoggerOptions } from 'pino';
import { randomUUID } from 'node:crypto';

// =============================================================================
// Configuration
// =============================================================================

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_PRODUCTION = process.env.NODE_ENV === 'production';
const IS_TEST = process.env.NODE_ENV === 'test';

/**
 * Pino configuration options
 */
const pinoOptions: LoggerOptions = {
  level: LOG_LEVEL,
  // JSON in production and tests, pretty print in development
  ...(IS_PRODUCTION || IS_TEST
    ? {
        formatters: {
          level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.isoTime,
      }
    : {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
      }),
};

// =============================================================================
// Main Logger Instance
// =============================================================================

/**
 * Root logger instance.
 * Use child loggers for specific contexts.
 */
export const logger: Logger = pino(pinoOptions);

// =============================================================================
// Request Context
// =============================================================================

export type LogLayer = 'ingestion' | 'embedding' | 'index' | 'rag' | 'db' | 'external';

/**
 * Request context for tracing
 */
export interface RequestContext {
  traceId: string;
  sessionId?: string;
  documentId?: string;
  startTime: number;
}

/**
 * Generate a new request context with unique traceId
 */
export function createRequestContext(options?: {
  sessionId?: string;
  documentId?: string;
}): RequestContext {
  return {
    traceId: randomUUID(),
    sessionId: options?.sessionId,
    documentId: options?.documentId,
    startTime: Date.now(),
  };
}

/**
 * Create a child logger bound to a request context
 */
export function createRequestLogger(ctx: RequestContext): Logger {
  return logger.child({
    traceId: ctx.traceId,
    ...(ctx.sessionId && { session: ctx.sessionId }),
    ...(ctx.documentId && { document: ctx.documentId }),
  });
}

// =============================================================================
// Layer-Specific Loggers
// =============================================================================

/**
 * Create a child logger for a specific layer
 */
export function createLayerLogger(layer: LogLayer, ctx?: RequestContext): Logger {
  const base = ctx ? createRequestLogger(ctx) : logger;
  return base.child({ layer });
}

/**
 * Pre-configured layer loggers (without request context)
 */
export const loggers = {
  ingestion: logger.child({ layer: 'ingestion' }),
  embedding: logger.child({ layer: 'embedding' }),
  index: logger.child({ layer: 'index' }),
  rag: logger.child({ layer: 'rag' }),
  db: logger.child({ layer: 'db' }),
  external: logger.child({ layer: 'external' }),
};

// =============================================================================
// Sanitization Utilities
// =============================================================================

const MAX_TEXT_LENGTH = 200;
const MAX_EMBEDDING_PREVIEW = 5;

/**
 * Patterns for detecting sensitive data
 */
const SENSITIVE_PATTERNS = [
  /sk-[a-zA-Z0-9_-]{20,}/g, // OpenAI API keys
  /postgres(?:ql)?:\/\/[^@\s]+@/g, // Database URLs with credentials
  /Bearer [a-zA-Z0-9._-]+/g,
  /password[=:]\s*["']?[^"'\s]+/gi,
  /api[_-]?key[=:]\s*["']?[^"'\s]+/gi,
];

/**
 * Sanitize a string by redacting sensitive patterns
 */
export function sanitizeString(value: string): string {
  let sanitized = value;
  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }
  return sanitized;
}

/**
 * Truncate text content for logging
 */
export function truncateText(text: string, maxLength = MAX_TEXT_LENGTH): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength)}... (${text.length} chars total)`;
}

/**
 * Sanitize embedding vectors (show only preview)
 */
export function sanitizeEmbedding(
  embedding: number[]
): { preview: number[]; dimensions: number } {
  return {
    preview: embedding.slice(0, MAX_EMBEDDING_PREVIEW),
    dimensions: embedding.length,
  };
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.length > 0 && value.every((v) => typeof v === 'number');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Sanitize an object for logging
 */
export function sanitizeForLogging(
  obj: Record<string, unknown>,
  options?: {
    truncateKeys?: string[];
    redactKeys?: string[];
  }
): Record<string, unknown> {
  const { truncateKeys = [], redactKeys = [] } = options || {};
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (redactKeys.includes(key)) {
      result[key] = '[REDACTED]';
      continue;
    }

    if (typeof value === 'string') {
      result[key] = truncateKeys.includes(key) ? truncateText(value) : sanitizeString(value);
    } else if (isNumberArray(value)) {
      // Likely an embedding vector
      result[key] = sanitizeEmbedding(value);
    } else if (isRecord(value)) {
      result[key] = sanitizeForLogging(value, options);
    } else {
      result[key] = value;
    }
  }

  return result;
}

// =============================================================================
// Timing Utilities
// =============================================================================

/**
 * Timing information attached to chat responses
 */
export interface TimingInfo {
  traceId: string;
  rewrite_ms?: number;
  embedding_ms?: number;
  curated_ms?: number;
  retrieval_ms?: number;
  prompt_ms?: number;
  generation_ms?: number;
  total_ms: number;
}

/**
 * Timer class for tracking operation durations
 */
export class Timer {
  private startTime: number;
  private marks: Map<string, number> = new Map();
  private durations: Map<string, number> = new Map();

  constructor() {
    this.startTime = Date.now();
  }

  mark(name: string): void {
    this.marks.set(name, Date.now());
  }

  /**
   * Record the duration since a mark
   */
  measure(name: string): number {
    const markTime = this.marks.get(name);
    if (markTime === undefined) {
      return 0;
    }
    const duration = Date.now() - markTime;
    this.durations.set(name, duration);
    return duration;
  }

  getDuration(name: string): number | undefined {
    return this.durations.get(name);
  }

  elapsed(): number {
    return Date.now() - this.startTime;
  }

  getAllDurations(): Record<string, number> {
    const result: Record<string, number> = {};
    for (const [key, value] of this.durations) {
      result[`${key}_ms`] = value;
    }
    return result;
  }

  toTimingInfo(traceId: string): TimingInfo {
    return {
      traceId,
      ...this.getAllDurations(),
      total_ms: this.elapsed(),
    };
  }
}

// =============================================================================
// Logging Helpers
// =============================================================================

/**
 * Log a database operation
 */
export function logDbOperation(
  log: Logger,
  operation: string,
  details: {
    table?: string;
    rows?: number;
    duration_ms: number;
    error?: string;
  }
): void {
  if (details.error) {
    log.error(
      { event: 'db_operation', operation, ...details },
      `Database ${operation} failed: ${details.error}`
    );
  } else {
    log.debug(
      { event: 'db_operation', operation, ...details },
      `Database ${operation} completed`
    );
  }
}

/**
 * Log an external service call
 */
export function logExternalCall(
  log: Logger,
  service: 'openai' | 'postgres' | 'other',
  operation: string,
  details: {
    duration_ms?: number;
    status?: number | string;
    error?: string;
    tokens?: number;
    model?: string;
    attempt?: number;
  }
): void {
  const baseLog = {
    event: 'external_call',
    service,
    operation,
    ...details,
  };

  if (details.error) {
    log.error(baseLog, `${service} ${operation} failed: ${details.error}`);
  } else {
    log.debug(baseLog, `${service} ${operation} completed`);
  }
}

/**
 * Log an ingestion step
 */
export function logIngestionStep(
  log: Logger,
  step: 'parse' | 'chunk' | 'embed' | 'upsert' | 'prune' | 'store',
  details: {
    duration_ms?: number;
    chunks?: number;
    chars?: number;
    error?: string;
  }
): void {
  const baseLog = { event: `ingestion_${step}`, ...details };

  if (details.error) {
    log.error(baseLog, `Ingestion ${step} failed: ${details.error}`);
  } else {
    log.debug(baseLog, `Ingestion ${step} completed`);
  }
}

/**
 * Log RAG pipeline step
 */
export function logRagStep(
  log: Logger,
  step: 'rewrite' | 'embedding' | 'curated' | 'retrieval' | 'prompt' | 'generation' | 'citation',
  details: {
    duration_ms?: number;
    chunks?: number;
    similarity?: number;
    invalidCitations?: number[];
    tokens?: number;
    chars?: number;
    droppedTurns?: number;
    droppedChunks?: number;
    model?: string;
    error?: string;
  }
): void {
  const baseLog = {
    event: `rag_${step}`,
    ...details,
  };

  if (details.error) {
    log.error(baseLog, `RAG ${step} failed: ${details.error}`);
  } else {
    log.debug(baseLog, `RAG ${step} completed`);
  }
}

// =============================================================================
// Export Types
// =============================================================================

export type { Logger } from 'pino';
