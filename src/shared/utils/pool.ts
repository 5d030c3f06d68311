/**
 * Bounded worker pool for fanning out independent async calls.
 */

/**
 * Maps items through an async function with at most `limit` calls in flight.
 *
 * Each worker pulls the next unclaimed index, so results keep input order
 * regardless of completion order. A rejected call rejects the whole map;
 * callers that want per-item failures must catch inside `fn`.
 *
 * @param items - Inputs to process
 * @param limit - Maximum concurrent calls (values below 1 are treated as 1)
 * @param fn - Async mapper
 * @returns Results in the same order as `items`
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workerCount = Math.min(Math.max(1, Math.floor(limit)), items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return results;
}
