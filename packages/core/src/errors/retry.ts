// ============================================
// Retry and Timeout
// ============================================

import { ErrorCode, WordclassError } from "./types.js";

/**
 * Thrown when a lookup or its backoff is cancelled through an AbortSignal.
 */
export class AbortError extends Error {
  constructor(message = "Operation aborted") {
    super(message);
    this.name = "AbortError";
  }
}

export interface RetryOptions {
  /** Retries after the first attempt (default: 2) */
  maxRetries?: number;
  /** Delay before the first retry, doubled for each one after (default: 1000) */
  baseDelay?: number;
  /** Upper bound for any delay, including a server's Retry-After (default: 30000) */
  maxDelay?: number;
  onRetry?: (error: WordclassError, attempt: number, delay: number) => void;
  signal?: AbortSignal;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Runs `fn`, retrying while it throws a WordclassError marked retryable.
 *
 * The wait is the error's `retryDelay` when it carries one (a 429's
 * Retry-After), otherwise `baseDelay * 2^(attempt - 1)`; both are capped at
 * `maxDelay`. Anything else, or the last retryable failure, is rethrown.
 *
 * @throws AbortError once the signal fires, before an attempt or during a wait
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 2, baseDelay = 1000, maxDelay = 30_000, onRetry, signal } = options;

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      throw new AbortError();
    }
    try {
      return await fn();
    } catch (error) {
      if (attempt > maxRetries || !(error instanceof WordclassError) || !error.isRetryable) {
        throw error;
      }
      const delay = Math.min(error.retryDelay ?? baseDelay * 2 ** (attempt - 1), maxDelay);
      onRetry?.(error, attempt, delay);
      await sleep(delay, signal);
    }
  }
}

/**
 * Rejects with LOOKUP_TIMEOUT when `fn` has not settled within `timeout` ms.
 * The caller is expected to cancel the underlying request itself.
 */
export function withTimeout<T>(fn: () => Promise<T>, timeout: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(
        new WordclassError(`Operation timed out after ${timeout}ms`, ErrorCode.LOOKUP_TIMEOUT, {
          context: { timeout },
        })
      );
    }, timeout);
  });
  return Promise.race([fn(), expired]).finally(() => clearTimeout(timer));
}
