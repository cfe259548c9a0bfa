/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Items are started in index order; each result is stored at its item's index,
 * so the output order never depends on completion order.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  const queue = items.map((item, index) => ({ item, index }));
  const results = new Array<R>(items.length);
  const workers: Promise<void>[] = [];

  for (let i = 0; i < Math.min(concurrency, items.length); i++) {
    workers.push(
      (async () => {
        while (queue.length) {
          const next = queue.shift();
          if (!next) break;
          results[next.index] = await worker(next.item, next.index);
        }
      })()
    );
  }

  await Promise.all(workers);
  return results;
}
