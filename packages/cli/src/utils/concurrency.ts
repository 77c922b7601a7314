// pattern: Functional Core

/**
 * Map over `items` with at most `limit` calls in flight. Results keep the
 * order of `items`. The first rejection rejects the whole map; calls already
 * started are allowed to finish.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`Concurrency limit must be a positive integer (got ${limit})`);
  }

  const results = new Array<R>(items.length);
  // Workers pull from one shared iterator, so each item is taken exactly once
  const pending = items.entries();

  const worker = async (): Promise<void> => {
    for (const [index, item] of pending) {
      results[index] = await fn(item, index);
    }
  };

  const workerCount = Math.min(limit, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
