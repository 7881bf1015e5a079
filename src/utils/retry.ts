/**
 * Timeout and retry helpers for suspending calls (embedding, planning,
 * tool handlers).
 */

import { TimeoutError } from '../errors/index.js';

/**
 * Resolve after `ms`. Rejects early if the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `operation` with a time budget.
 *
 * The operation receives an AbortSignal that aborts when the budget runs
 * out or when `parentSignal` aborts, so providers can cancel the underlying
 * request. The returned promise settles on expiry (TimeoutError) or parent
 * abort (the abort reason) even if the operation ignores its signal.
 *
 * @param label - Operation name used in the TimeoutError message
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  parentSignal?: AbortSignal
): Promise<T> {
  parentSignal?.throwIfAborted();

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const interrupted = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
    onParentAbort = (): void => {
      controller.abort(parentSignal?.reason);
      reject(parentSignal?.reason);
    };
    parentSignal?.addEventListener('abort', onParentAbort, { once: true });
  });

  try {
    return await Promise.race([operation(controller.signal), interrupted]);
  } finally {
    clearTimeout(timer);
    if (onParentAbort) {
      parentSignal?.removeEventListener('abort', onParentAbort);
    }
  }
}

export interface RetryOptions {
  /** Retries after the first attempt (0 = single attempt) */
  retries: number;
  /** Delay before the first retry; doubles on each further retry */
  baseDelayMs: number;
  /** Upper bound for a single delay */
  maxDelayMs?: number;
  /** Return false to stop retrying and rethrow immediately */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Called before each retry with the 1-based attempt number that failed */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Stops waiting between attempts */
  signal?: AbortSignal;
}

/**
 * Thrown by retryWithBackoff when every attempt failed. Carries the last
 * error and the number of attempts made.
 */
export class RetryExhaustedError extends Error {
  constructor(
    public readonly lastError: unknown,
    public readonly attempts: number
  ) {
    super(
      `Gave up after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${
        lastError instanceof Error ? lastError.message : String(lastError)
      }`,
      { cause: lastError }
    );
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Delay before retry number `retry` (0-based).
 */
export function backoffDelay(retry: number, baseDelayMs: number, maxDelayMs = 30_000): number {
  return Math.min(baseDelayMs * 2 ** retry, maxDelayMs);
}

/**
 * Run `operation` until it succeeds, retrying with exponential backoff.
 *
 * Non-retryable errors (per `shouldRetry`) are rethrown as-is. When the
 * retry budget runs out, RetryExhaustedError wraps the last error.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { retries, baseDelayMs, maxDelayMs, shouldRetry, onRetry, signal } = options;
  const maxAttempts = retries + 1;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (shouldRetry && !shouldRetry(error, attempt)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        throw new RetryExhaustedError(error, attempt);
      }
      const delay = backoffDelay(attempt - 1, baseDelayMs, maxDelayMs);
      onRetry?.(error, attempt, delay);
      await sleep(delay, signal);
    }
  }
}
