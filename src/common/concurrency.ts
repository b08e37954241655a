/**
 * Runs `worker` over `items` with at most `limit` in flight. Results keep the
 * input order regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const poolSize = Math.max(1, Math.min(Math.trunc(limit) || 1, items.length));
  let cursor = 0;

  const runWorker = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor;
      cursor += 1;
      results[index] = await worker(items[index], index);
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < poolSize; i += 1) {
    workers.push(runWorker());
  }
  await Promise.all(workers);
  return results;
}
