export type PoolResult<T, R> =
  | { ok: true; item: T; value: R }
  | { ok: false; item: T; error: unknown };

/**
 * Run `fn` over `items` with at most `concurrency` calls in flight.
 *
 * A fixed number of workers pull from a shared cursor, so a slow unit never
 * holds back the others. A throwing unit is recorded and the pool keeps going.
 * Results come back in input order regardless of completion order.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, workerId: number) => Promise<R>
): Promise<PoolResult<T, R>[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const results: PoolResult<T, R>[] = new Array(items.length);
  let next = 0;

  async function worker(workerId: number): Promise<void> {
    while (next < items.length) {
      const i = next++;
      const item = items[i];
      try {
        results[i] = { ok: true, item, value: await fn(item, workerId) };
      } catch (error) {
        results[i] = { ok: false, item, error };
      }
    }
  }

  const workerCount = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: workerCount }, (_, id) => worker(id)));
  return results;
}
