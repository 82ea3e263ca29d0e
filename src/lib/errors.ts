/**
 * RAG error taxonomy.
 *
 * Every failure that crosses a module boundary is a RAGError with a
 * machine-readable `kind`. Callers branch on the kind, never on messages.
 */

// =============================================================================
// Types
// =============================================================================

export type RAGErrorKind =
  | 'UnsupportedFormat'
  | 'EmptyContent'
  | 'EmbeddingProviderError'
  | 'RateLimited'
  | 'IndexUnavailable'
  | 'GenerationUnavailable'
  | 'RetrievalUnavailable'
  | 'Cancelled'
  | 'InvalidRequest'
  | 'IngestionInProgress'
  | 'ConfigurationError';

export type ErrorContext = Record<string, string | number | boolean | undefined>;

export interface RAGErrorOptions {
  cause?: unknown;
  /** Kind of the failure that triggered this one, when it was translated */
  originKind?: RAGErrorKind;
  context?: ErrorContext;
}

// =============================================================================
// Base Class
// =============================================================================

export class RAGError extends Error {
  public readonly kind: RAGErrorKind;
  public readonly retryable: boolean;
  public readonly originKind?: RAGErrorKind;
  public readonly context: ErrorContext;

  constructor(kind: RAGErrorKind, message: string, retryable: boolean, options: RAGErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = kind.endsWith('Error') ? kind : `${kind}Error`;
    this.kind = kind;
    this.retryable = retryable;
    this.originKind = options.originKind;
    this.context = options.context ?? {};
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      retryable: this.retryable,
      ...(this.originKind && { originKind: this.originKind }),
      context: this.context,
    };
  }
}

// =============================================================================
// Ingestion Errors
// =============================================================================

export class UnsupportedFormatError extends RAGError {
  constructor(message: string, options?: RAGErrorOptions) {
    super('UnsupportedFormat', message, false, options);
  }
}

export class EmptyContentError extends RAGError {
  constructor(message = 'Document contains no extractable text', options?: RAGErrorOptions) {
    super('EmptyContent', message, false, options);
  }
}

export class IngestionInProgressError extends RAGError {
  constructor(documentId: string) {
    super('IngestionInProgress', `Document ${documentId} is already being ingested`, true, {
      context: { documentId },
    });
  }
}

// =============================================================================
// Provider / Infrastructure Errors
// =============================================================================

export class EmbeddingProviderError extends RAGError {
  constructor(message: string, options?: RAGErrorOptions) {
    super('EmbeddingProviderError', message, false, options);
  }
}

export class RateLimitedError extends RAGError {
  constructor(message: string, options?: RAGErrorOptions) {
    super('RateLimited', message, true, options);
  }
}

export class IndexUnavailableError extends RAGError {
  constructor(message: string, options?: RAGErrorOptions) {
    super('IndexUnavailable', message, true, options);
  }
}

export class GenerationUnavailableError extends RAGError {
  constructor(message: string, options?: RAGErrorOptions) {
    super('GenerationUnavailable', message, true, options);
  }
}

export class RetrievalUnavailableError extends RAGError {
  constructor(message: string, options?: RAGErrorOptions) {
    super('RetrievalUnavailable', message, true, options);
  }
}

// =============================================================================
// Request Errors
// =============================================================================

export class CancelledError extends RAGError {
  constructor(message = 'Request was cancelled', options?: RAGErrorOptions) {
    super('Cancelled', message, false, options);
  }
}

export class InvalidRequestError extends RAGError {
  constructor(message: string, options?: RAGErrorOptions) {
    super('InvalidRequest', message, false, options);
  }
}

export class ConfigurationError extends RAGError {
  constructor(message: string, options?: RAGErrorOptions) {
    super('ConfigurationError', message, false, options);
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Narrow an unknown value to a RAGError, optionally of a given kind.
 */
export function isRAGError(error: unknown, kind?: RAGErrorKind): error is RAGError {
  return error instanceof RAGError && (kind === undefined || error.kind === kind);
}

/**
 * Extract a readable message from any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * HTTP status carried by provider SDK errors (OpenAI's APIError and friends).
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * p-timeout rejects with an error named TimeoutError.
 */
export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}

/**
 * Provider failures worth another attempt: timeouts, network errors
 * (no HTTP status), 408, 409, 429 and 5xx. Our own errors never are.
 */
export function isTransientProviderError(error: unknown): boolean {
  if (error instanceof RAGError) return false;
  if (isTimeoutError(error)) return true;

  const status = getErrorStatus(error);
  if (status === undefined) return error instanceof Error;
  return status === 408 || status === 409 || status === 429 || status >= 500;
}

const STATUS_BY_KIND: Record<RAGErrorKind, number> = {
  UnsupportedFormat: 415,
  EmptyContent: 422,
  InvalidRequest: 400,
  IngestionInProgress: 409,
  RateLimited: 429,
  Cancelled: 499,
  EmbeddingProviderError: 502,
  GenerationUnavailable: 503,
  RetrievalUnavailable: 503,
  IndexUnavailable: 503,
  ConfigurationError: 500,
};

export interface ErrorResponse {
  status: number;
  body: {
    error: string;
    kind: RAGErrorKind | 'Internal';
    retryable: boolean;
  };
}

/**
 * Map an error to a status hint and body for a transport layer.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (isRAGError(error)) {
    return {
      status: STATUS_BY_KIND[error.kind],
      body: { error: error.message, kind: error.kind, retryable: error.retryable },
    };
  }
  return {
    status: 500,
    body: { error: 'Internal error', kind: 'Internal', retryable: false },
  };
}
