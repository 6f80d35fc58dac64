/**
 * Maps `items` through `fn` with at most `limit` calls in flight. Results keep
 * the input order. After the first rejection no new calls start; the ones in
 * flight are awaited and then that first error is thrown.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const maxConcurrent = Math.max(1, limit);
  const results = new Array<R>(items.length);
  const executing = new Set<Promise<void>>();
  const failures: unknown[] = [];

  for (let i = 0; i < items.length && failures.length === 0; i++) {
    const promise: Promise<void> = fn(items[i], i)
      .then(
        (result) => {
          results[i] = result;
        },
        (error: unknown) => {
          failures.push(error);
        },
      )
      .then(() => {
        executing.delete(promise);
      });
    executing.add(promise);

    if (executing.size >= maxConcurrent) {
      await Promise.race(executing);
    }
  }

  await Promise.all(Array.from(executing));
  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}
