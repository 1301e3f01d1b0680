import { setTimeout as sleep } from 'timers/promises';
import { CancelledError } from './errors.js';

export interface RetryOptions {
  /** Retries after the first attempt (total attempts = maxRetries + 1) */
  maxRetries: number;
  /** Delay before retry n is baseDelayMs * 2^(n-1) */
  baseDelayMs: number;
  signal?: AbortSignal;
  /** Log tag, e.g. "[Research]" */
  tag: string;
  operation: string;
}

/**
 * Run `fn` until it succeeds or the retry budget is spent, backing off exponentially.
 * Aborting the signal stops retrying and throws CancelledError.
 * @throws the last error from `fn` once every attempt has failed
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxRetries, baseDelayMs, signal, tag, operation } = options;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
    throwIfAborted(signal);
    try {
      return await fn(attempt);
    } catch (error) {
      if (signal?.aborted) throw new CancelledError();
      lastError = error;

      if (attempt > maxRetries) break;

      const delay = baseDelayMs * Math.pow(2, attempt - 1);
      console.error(`${tag} ${operation} failed (attempt ${attempt}/${maxRetries + 1}), retrying in ${delay}ms: ${describe(error)}`);
      await backoff(delay, signal);
    }
  }

  console.error(`${tag} ${operation} failed after ${maxRetries + 1} attempts`);
  throw lastError;
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new CancelledError();
}

async function backoff(delay: number, signal?: AbortSignal): Promise<void> {
  if (delay <= 0) return;
  try {
    await sleep(delay, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) throw new CancelledError();
    throw error;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
