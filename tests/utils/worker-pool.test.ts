import { describe, it, expect } from 'vitest';
import { runWithConcurrency } from '@/utils/worker-pool';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('runWithConcurrency', () => {
  it('returns results in input order', async () => {
    const results = await runWithConcurrency([30, 10, 20], 3, async (ms, index) => {
      await new Promise((r) => setTimeout(r, ms));
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:10', '2:20']);
  });

  it('never runs more than the limit at once', async () => {
    let active = 0;
    let peak = 0;
    await runWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((r) => setTimeout(r, 1));
      active--;
    });

    expect(peak).toBe(2);
  });

  it('runs one at a time with concurrency 1', async () => {
    const order: string[] = [];
    const gate = deferred();
    const run = runWithConcurrency(['a', 'b'], 1, async (item) => {
      order.push(`start ${item}`);
      if (item === 'a') await gate.promise;
      order.push(`end ${item}`);
    });
    await Promise.resolve();
    expect(order).toEqual(['start a']);

    gate.resolve();
    await run;
    expect(order).toEqual(['start a', 'end a', 'start b', 'end b']);
  });

  it('treats a non-positive limit as 1', async () => {
    expect(await runWithConcurrency([1, 2], 0, async (n) => n * 2)).toEqual([2, 4]);
  });

  it('handles an empty wave', async () => {
    expect(await runWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});
