import { afterEach, describe, it, expect, vi } from 'vitest';
import { withTimeout } from '@/stability/withTimeout';
import { TimeoutError } from '@/utils/errors';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the value when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 1000)).resolves.toBe(42);
  });

  it('passes the original rejection through', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 1000)).rejects.toThrow('boom');
  });

  it('rejects with a TimeoutError once the deadline passes', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), 250, 'mail');
    const assertion = expect(pending).rejects.toThrow('mail timed out after 250ms');

    await vi.advanceTimersByTimeAsync(250);
    await assertion;
    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
  });

  it('clears its timer after settling', async () => {
    vi.useFakeTimers();
    await withTimeout(Promise.resolve('ok'), 1000);

    expect(vi.getTimerCount()).toBe(0);
  });
});
