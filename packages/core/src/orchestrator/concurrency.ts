/**
 * Runs `executor` over `items` with at most `concurrency` calls in flight.
 * Results keep the order of `items`, whatever order the calls finish in.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  executor: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let currentIndex = 0;

  async function runNext(): Promise<void> {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      const item = items[index];
      if (item === undefined) break;
      results[index] = await executor(item, index);
    }
  }

  const lanes = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () =>
    runNext()
  );
  await Promise.all(lanes);

  return results;
}
