import { describe, it, expect, vi } from 'vitest';
import { computeBackoffDelay, retryWithBackoff, RetryExhaustedError } from '@/stability/retryWithBackoff';

const fast = { initialDelay: 0, maxDelay: 0, jitter: false };

describe('retryWithBackoff', () => {
  it('returns the first successful result', async () => {
    const fn = vi.fn(async (attempt: number) => `ok on ${attempt}`);

    await expect(retryWithBackoff(fn, fast)).resolves.toBe('ok on 1');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries until the call succeeds', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValue('done');
    const onRetry = vi.fn();

    await expect(retryWithBackoff(fn, { ...fast, maxAttempts: 3, onRetry })).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenLastCalledWith(expect.any(Error), 2, 0);
  });

  it('gives up after maxAttempts with the attempt count and last error', async () => {
    const fn = vi.fn(async () => {
      throw new Error('down');
    });

    const error = await retryWithBackoff(fn, { ...fast, maxAttempts: 2 }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.attempts).toBe(2);
      expect(error.message).toBe('down');
      expect(error.lastError).toBeInstanceOf(Error);
    }
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops early when shouldRetry declines', async () => {
    const fn = vi.fn(async () => {
      throw new Error('bad input');
    });

    const error = await retryWithBackoff(fn, { ...fast, maxAttempts: 5, shouldRetry: () => false }).catch(
      (err: unknown) => err,
    );

    expect(fn).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(RetryExhaustedError);
  });

  it('does not start another attempt once the signal is aborted', async () => {
    const controller = new AbortController();
    const fn = vi.fn(async () => {
      controller.abort();
      throw new Error('interrupted');
    });

    await expect(retryWithBackoff(fn, { ...fast, signal: controller.signal })).rejects.toBeInstanceOf(
      RetryExhaustedError,
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('computeBackoffDelay', () => {
  it('doubles per attempt without jitter', () => {
    const options = { initialDelay: 100, maxDelay: 10_000, jitter: false };
    expect([1, 2, 3, 4].map((attempt) => computeBackoffDelay(attempt, options))).toEqual([100, 200, 400, 800]);
  });

  it('caps the delay', () => {
    expect(computeBackoffDelay(10, { initialDelay: 100, maxDelay: 1000, jitter: false })).toBe(1000);
  });

  it('adds up to a quarter of the delay as jitter', () => {
    expect(computeBackoffDelay(1, { initialDelay: 100, maxDelay: 1000 }, () => 1)).toBe(125);
    expect(computeBackoffDelay(1, { initialDelay: 100, maxDelay: 1000 }, () => 0)).toBe(100);
  });
});
