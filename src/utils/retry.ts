import { AbortError } from '../error/abortError.js';
import { RetryExhaustedError } from '../error/retryExhaustedError.js';
import { RetrySuppressedError } from '../error/retrySuppressedError.js';
import { sleep } from './sleep.js';
import type { SafeWrapAsync } from './wrap.js';

/** Options for {@link retry}. */
export interface RetryOptions<R> {
  /** Function to execute; must return a tuple-style result. */
  fn: () => SafeWrapAsync<Error, R>;
  /**
   * Maximum number of retries after the initial attempt (total tries = attempts + 1).
   * Passing 0 means "try once, then stop."
   */
  attempts?: number;
  /** Milliseconds to wait between attempts. */
  timeout?: number;
  /**
   * Predicate that decides whether to stop retrying.
   * Return true to stop retrying and surface the error, false to continue.
   */
  errFn?: (e: Error) => boolean;
  /** Called before waiting ahead of another attempt. */
  onRetry?: (e: Error, attempt: number) => void;
  /**
   * Overrides the wait before the next attempt. Returning a value below
   * `timeout` still waits `timeout`.
   */
  delayFn?: (e: Error, attempt: number) => number | null;
  /** Cuts the wait between attempts short and stops further attempts. */
  signal?: AbortSignal | null;
}

/**
 * Keeps calling `fn` until it returns data, `errFn` stops it, or the
 * retries run out. `fn` reports failure through its tuple, never by throwing.
 *
 * An abort on `signal` while waiting ends the loop at once with an
 * {@link AbortError} whose cause is the signal's reason.
 *
 * @example
 * const [err, rows] = await retry({
 *   fn: () => fetchRows(),
 *   attempts: 3,
 *   timeout: 500,
 *   errFn: (e) => !isTimeoutError(e),
 * });
 */
export async function retry<R = unknown>({
  fn,
  attempts = 10,
  timeout = 1000,
  errFn,
  onRetry,
  delayFn,
  signal,
}: RetryOptions<R>): SafeWrapAsync<Error, R> {
  for (let attempt = 1; ; attempt += 1) {
    const [err, data] = await fn();
    if (!err) {
      return [null, data];
    }

    if (typeof errFn === 'function' && errFn(err)) {
      return [new RetrySuppressedError('error further retries suppressed', attempt, { cause: err }), null];
    }

    if (attempt > attempts) {
      return [new RetryExhaustedError('error retries exhausted', attempt, { cause: err }), null];
    }

    onRetry?.(err, attempt);
    await sleep(Math.max(timeout, delayFn?.(err, attempt) ?? 0), signal);

    if (signal?.aborted) {
      return [new AbortError('error retry wait aborted', { cause: signal.reason }), null];
    }
  }
}
