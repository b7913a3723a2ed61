/**
 * Map over items with at most `concurrency` calls in flight. Results keep the
 * input order regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const executing = new Set<Promise<void>>();

  for (const [index, item] of items.entries()) {
    const promise: Promise<void> = fn(item, index).then((result) => {
      results[index] = result;
    });
    const tracked = promise.finally(() => executing.delete(tracked));
    executing.add(tracked);

    if (executing.size >= Math.max(1, concurrency)) {
      await Promise.race(executing);
    }
  }

  await Promise.all(executing);
  return results;
}
