/**
 * Timeout wrapper for provider and storage calls.
 */

import pTimeout from 'p-timeout';
import { CancelledError } from '@/lib/errors';

export interface TimeoutOptions {
  /** Omit for no limit */
  timeoutMs?: number;
  operation: string;
  signal?: AbortSignal;
}

/**
 * Race a promise against a timer and an optional abort signal.
 *
 * A timeout rejects with p-timeout's TimeoutError. An abort rejects with
 * CancelledError. The underlying call is not interrupted.
 */
export async function withTimeout<T>(promise: PromiseLike<T>, options: TimeoutOptions): Promise<T> {
  const { timeoutMs, operation, signal } = options;

  try {
    return await pTimeout(promise, {
      milliseconds: timeoutMs ?? Number.POSITIVE_INFINITY,
      message: `Operation '${operation}' timed out after ${timeoutMs}ms`,
      signal,
    });
  } catch (error) {
    if (signal?.aborted) {
      throw new CancelledError(`${operation} cancelled`, { cause: error });
    }
    throw error;
  }
}
