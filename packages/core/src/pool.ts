/**
 * Bounded-concurrency map
 *
 * A fixed number of workers drain a shared queue. Results keep input order;
 * the returned promise settles only after every worker has finished. A worker
 * that throws stops taking items; the others drain the rest of the queue.
 */
export async function mapPool<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const queue = items.map((item, index) => ({ item, index }));
  const workers: Promise<void>[] = [];

  for (let i = 0; i < Math.min(Math.max(1, concurrency), queue.length); i++) {
    workers.push(
      (async () => {
        while (queue.length > 0) {
          const next = queue.shift();
          if (!next) break;

          results[next.index] = await fn(next.item, next.index);
        }
      })()
    );
  }

  // Wait for every worker even when one fails, then surface the first failure
  const settled = await Promise.allSettled(workers);
  for (const outcome of settled) {
    if (outcome.status === "rejected") {
      throw outcome.reason;
    }
  }
  return results;
}
