// packages/core/src/utils/retry.ts

import { sleep } from './time.js';

export interface RetryOptions {
  attempts: number;
  backoff: number;
  /** Upper bound for a single delay. */
  maxBackoff: number;
  retryOn?: (error: unknown) => boolean;
  /** Called before each delay with the attempt that just failed. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Replaces the plain timer; resolve false to stop retrying. */
  wait?: (ms: number) => Promise<boolean>;
}

const defaultOptions: RetryOptions = {
  attempts: 3,
  backoff: 1000,
  maxBackoff: 30_000,
};

export function backoffDelay(attempt: number, backoff: number, maxBackoff: number): number {
  return Math.min(backoff * 2 ** (attempt - 1), maxBackoff);
}

/**
 * Retry an async function with exponential backoff.
 * Returns the result on success, throws the last error after all attempts exhausted.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: Partial<RetryOptions>,
): Promise<T> {
  const opts = { ...defaultOptions, ...options };
  let lastError: unknown;

  for (let attempt = 1; attempt <= opts.attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (opts.retryOn && !opts.retryOn(error)) {
        throw error;
      }

      if (attempt < opts.attempts) {
        const delay = backoffDelay(attempt, opts.backoff, opts.maxBackoff);
        opts.onRetry?.(error, attempt, delay);
        if (opts.wait) {
          if (!(await opts.wait(delay))) throw error;
        } else {
          await sleep(delay);
        }
      }
    }
  }

  throw lastError;
}
