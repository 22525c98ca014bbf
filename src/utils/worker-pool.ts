/**
 * Fixed-size worker pool for one wave of tasks. At most `concurrency` tasks run at
 * once; results come back in input order. With concurrency 1 the wave is sequential.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const limit = Math.max(1, Math.floor(concurrency));
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  const runNext = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await worker(item, index);
    }
  };

  const slots = Array.from({ length: Math.min(limit, items.length) }, () => runNext());
  await Promise.all(slots);
  return results;
}
