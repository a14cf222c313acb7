import { SyncTimeoutError } from '../errors';

/**
 * Run `task` with an upper bound on its duration. On expiry the signal
 * handed to the task is aborted and the returned promise rejects with
 * SyncTimeoutError, whatever the task does afterwards.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new SyncTimeoutError(operation, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), expiry]);
  } finally {
    clearTimeout(timer);
  }
}
