/**
 * Sliding-window worker pool.
 *
 * At most `limit` tasks are in flight; each settled task immediately starts
 * the next queued one. Results keep input order and every item is accounted
 * for, fulfilled or rejected.
 */

export type PoolResult<T> = PromiseSettledResult<T>;

export async function runPool<I, T>(
  items: readonly I[],
  limit: number,
  worker: (item: I, index: number) => Promise<T>
): Promise<PoolResult<T>[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Pool limit must be a positive integer, got ${String(limit)}`);
  }

  const results = new Array<PoolResult<T>>(items.length);
  // One iterator shared by all lanes: whichever lane frees up first takes the next item
  const queue = items.entries();

  async function lane(): Promise<void> {
    for (const [index, item] of queue) {
      try {
        results[index] = { status: 'fulfilled', value: await worker(item, index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  }

  const lanes = Array.from({ length: Math.min(limit, items.length) }, () => lane());
  await Promise.all(lanes);
  return results;
}
