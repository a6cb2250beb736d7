/**
 * Timeout and retry helpers for shared store calls
 */

import { CollabError } from './errors/index.js';

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Race `promise` against a timer. Rejects with `STORE_TIMEOUT` when the
 * timer wins; the timer is always cleared.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(
        new CollabError({
          code: 'STORE_TIMEOUT',
          message: `${operation} timed out after ${timeoutMs}ms`,
          context: { operation, timeoutMs },
        })
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RetryOptions {
  /** Attempts after the first one */
  retries: number;
  /** Base delay; attempt `n` waits `delayMs * n` */
  delayMs: number;
  /** Called before each retry */
  onRetry?: (error: Error, attempt: number) => void;
}

/**
 * Run `fn` until it resolves, retrying with linear backoff. The last error
 * is rethrown once attempts run out.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= options.retries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      if (attempt < options.retries) {
        options.onRetry?.(lastError, attempt + 1);
        await delay(options.delayMs * (attempt + 1));
      }
    }
  }

  throw lastError ?? new CollabError({ code: 'INTERNAL_ERROR', message: 'Retry loop ended without result' });
}
