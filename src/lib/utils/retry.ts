/**
 * Retry with exponential backoff.
 *
 * The operation is re-run while `shouldRetry` accepts the failure and
 * attempts remain. The last failure is rethrown unchanged so callers can
 * map it to their own error kinds.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { CancelledError, isAbortError, isRAGError } from '@/lib/errors';

// =============================================================================
// Types
// =============================================================================

export interface RetryOptions {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Randomize each delay within [delay / 2, delay] */
  jitter?: boolean;
  shouldRetry: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

// =============================================================================
// Backoff
// =============================================================================

/**
 * Delay before the attempt following `attempt` (1-based).
 */
export function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitter = false,
  random: () => number = Math.random
): number {
  const delay = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
  if (!jitter) return delay;
  return Math.round(delay / 2 + (random() * delay) / 2);
}

export function throwIfAborted(signal: AbortSignal | undefined, operation = 'operation'): void {
  if (signal?.aborted) {
    throw new CancelledError(`${operation} cancelled`, { cause: signal.reason });
  }
}

// =============================================================================
// Retry Loop
// =============================================================================

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(options.signal);

    try {
      return await operation(attempt);
    } catch (error) {
      if (
        isRAGError(error, 'Cancelled') ||
        attempt >= maxAttempts ||
        !options.shouldRetry(error, attempt)
      ) {
        throw error;
      }

      const delay = computeBackoffDelay(
        attempt,
        options.baseDelayMs,
        options.maxDelayMs,
        options.jitter
      );
      options.onRetry?.(error, attempt, delay);

      try {
        await sleep(delay, undefined, { signal: options.signal });
      } catch (sleepError) {
        if (isAbortError(sleepError)) {
          throw new CancelledError('operation cancelled', { cause: sleepError });
        }
        throw sleepError;
      }
    }
  }
}
