import { OperationAbortedError } from '../errors/index';

/**
 * Runs `worker` over `items` with at most `limit` calls in flight. Results
 * keep input order. The first failure rejects the whole run and stops
 * workers from picking up further items; an aborted signal does the same.
 */
export async function runWithConcurrency<T, R>(
  items: T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let i = 0;
  let failed = false;

  const workers = new Array(Math.max(1, Math.min(limit, items.length))).fill(0).map(async () => {
    while (!failed) {
      if (signal?.aborted) {
        throw new OperationAbortedError('worker pool');
      }
      const idx = i++;
      if (idx >= items.length) break;
      const item = items[idx];
      if (item === undefined) continue;
      try {
        results[idx] = await worker(item, idx);
      } catch (e: unknown) {
        failed = true;
        throw e;
      }
    }
  });

  await Promise.all(workers);
  return results;
}
