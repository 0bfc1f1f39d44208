import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AbortError } from '../error/abortError.js';
import { RetryExhaustedError } from '../error/retryExhaustedError.js';
import { RetrySuppressedError } from '../error/retrySuppressedError.js';
import { unwrapErrorType } from '../error/unwrapErrorType.js';
import { retry } from './retry.js';
import type { SafeWrapAsync } from './wrap.js';

describe('retry', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns data immediately when fn succeeds on first attempt', async () => {
    const fn: () => SafeWrapAsync<Error, string[]> = vi.fn().mockResolvedValueOnce([null, ['Item']]);

    const [err, data] = await retry({ fn, attempts: 3, timeout: 100 });

    expect(err).toBeNull();
    expect(data).toEqual(['Item']);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries until fn succeeds, waiting between attempts', async () => {
    const error = new Error('error in GET request (status 503)');
    const fn: () => SafeWrapAsync<Error, string> = vi
      .fn()
      .mockResolvedValueOnce([error, null])
      .mockResolvedValueOnce([error, null])
      .mockResolvedValueOnce([null, 'ok']);
    const onRetry = vi.fn<(e: Error, attempt: number) => void>();

    const promise = retry({ fn, attempts: 3, timeout: 100, onRetry });
    expect(fn).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(99);
    expect(fn).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(fn).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(100);
    expect(fn).toHaveBeenCalledTimes(3);

    const [err, data] = await promise;
    expect(err).toBeNull();
    expect(data).toBe('ok');
    expect(onRetry.mock.calls).toEqual([
      [error, 1],
      [error, 2],
    ]);
  });

  it('does not retry when errFn returns true', async () => {
    const fatal = new Error('error in GET request (status 404)');
    const fn: () => SafeWrapAsync<Error, string> = vi.fn().mockResolvedValue([fatal, null]);
    const errFn = vi.fn<(e: Error) => boolean>().mockReturnValue(true);
    const onRetry = vi.fn<(e: Error, attempt: number) => void>();

    const [err, data] = await retry({ fn, attempts: 5, timeout: 100, errFn, onRetry });

    expect(fn).toHaveBeenCalledTimes(1);
    expect(errFn).toHaveBeenCalledWith(fatal);
    expect(onRetry).not.toHaveBeenCalled();
    expect(data).toBeNull();
    expect(err).toStrictEqual(new RetrySuppressedError('error further retries suppressed', 1, { cause: fatal }));
  });

  it('tries once and gives up when attempts is 0', async () => {
    const error = new Error('boom');
    const fn: () => SafeWrapAsync<Error, string> = vi.fn().mockResolvedValue([error, null]);

    const [err] = await retry({ fn, attempts: 0, timeout: 100 });

    expect(fn).toHaveBeenCalledTimes(1);
    expect(unwrapErrorType(RetryExhaustedError, err)?.attempts).toBe(1);
    expect(err?.cause).toBe(error);
  });

  it('returns RetryExhaustedError after the configured retries', async () => {
    const error = new Error('still bad');
    const fn: () => SafeWrapAsync<Error, string> = vi.fn().mockResolvedValue([error, null]);

    const promise = retry({ fn, attempts: 2, timeout: 100 });
    await vi.advanceTimersByTimeAsync(200);

    const [err, data] = await promise;
    expect(fn).toHaveBeenCalledTimes(3);
    expect(data).toBeNull();
    expect(err).toStrictEqual(new RetryExhaustedError('error retries exhausted', 3, { cause: error }));
  });

  it('waits the longer of timeout and the delayFn result', async () => {
    const error = new Error('error rate limit exceeded');
    const fn: () => SafeWrapAsync<Error, string> = vi
      .fn()
      .mockResolvedValueOnce([error, null])
      .mockResolvedValueOnce([null, 'ok']);
    const delayFn = vi.fn<(e: Error, attempt: number) => number | null>().mockReturnValue(2000);

    const promise = retry({ fn, attempts: 1, timeout: 100, delayFn });

    await vi.advanceTimersByTimeAsync(1999);
    expect(fn).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(fn).toHaveBeenCalledTimes(2);

    expect(await promise).toEqual([null, 'ok']);
    expect(delayFn).toHaveBeenCalledWith(error, 1);
  });

  it('keeps the timeout when delayFn asks for less', async () => {
    const fn: () => SafeWrapAsync<Error, string> = vi
      .fn()
      .mockResolvedValueOnce([new Error('busy'), null])
      .mockResolvedValueOnce([null, 'ok']);

    const promise = retry({ fn, attempts: 1, timeout: 100, delayFn: () => null });

    await vi.advanceTimersByTimeAsync(99);
    expect(fn).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(await promise).toEqual([null, 'ok']);
  });

  it('retries at once with a timeout of 0', async () => {
    const fn: () => SafeWrapAsync<Error, string> = vi
      .fn()
      .mockResolvedValueOnce([new Error('busy'), null])
      .mockResolvedValueOnce([null, 'ok']);

    const promise = retry({ fn, attempts: 1, timeout: 0 });
    await vi.advanceTimersByTimeAsync(0);

    expect(await promise).toEqual([null, 'ok']);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops waiting and returns an AbortError when the signal aborts', async () => {
    const error = new Error('error in GET request (status 503)');
    const fn: () => SafeWrapAsync<Error, string> = vi.fn().mockResolvedValue([error, null]);
    const controller = new AbortController();
    const reason = new AbortError('client was disposed');

    const promise = retry({ fn, attempts: 3, timeout: 10_000, signal: controller.signal });
    await vi.advanceTimersByTimeAsync(0);
    controller.abort(reason);

    const [err, data] = await promise;
    expect(data).toBeNull();
    expect(err).toStrictEqual(new AbortError('error retry wait aborted', { cause: reason }));
    expect(fn).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });
});
