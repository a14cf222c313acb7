/**
 * Utility for executing operations with exponential backoff retry logic.
 */

import type { Logger } from './logger';

export interface RetryOptions {
  baseDelayMs: number;
  maxRetries: number;
  log?: Logger;
  operationName?: string;
  /** Stops retrying once aborted; the abort reason is thrown */
  signal?: AbortSignal;
  /** Return false to fail immediately on a non-transient error */
  shouldRetry?: (error: Error) => boolean;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason instanceof Error ? signal.reason : new Error('Aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Execute a function with exponential backoff retry logic.
 *
 * @param operation - The async function to execute
 * @param options - Retry configuration options
 * @returns The result of the operation
 * @throws The last error if all retries fail
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { baseDelayMs, log, maxRetries, operationName, shouldRetry, signal } = options;
  let lastError: Error = new Error('Operation failed with no error details');

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    signal?.throwIfAborted();
    try {
      return await operation();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error('Unknown error');

      if (shouldRetry && !shouldRetry(lastError)) {
        throw lastError;
      }

      if (attempt < maxRetries - 1) {
        const delay = baseDelayMs * Math.pow(2, attempt);
        log?.warn(`${operationName ?? 'Operation'} failed, retrying in ${String(delay)}ms`, {
          attempt: attempt + 1,
          error: lastError.message,
          maxRetries,
        });
        await sleep(delay, signal);
      }
    }
  }

  log?.error(`${operationName ?? 'Operation'} failed after ${String(maxRetries)} attempts`, lastError);
  throw lastError;
}
