/**
 * Runs `mapper` over `items` with at most `concurrency` calls in flight.
 * Results keep the input order regardless of completion order.
 *
 * After the first rejection no further items are started; the returned
 * promise rejects with that error once the calls already in flight settle.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  mapper: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isFinite(concurrency) || concurrency <= 0) {
    throw new Error("Concurrency must be a positive number.");
  }

  if (items.length === 0) {
    return [];
  }

  const results = new Array<R>(items.length);
  const workerCount = Math.min(Math.floor(concurrency), items.length);
  let cursor = 0;
  const failures: unknown[] = [];

  const workers = Array.from({ length: workerCount }, async () => {
    while (failures.length === 0 && cursor < items.length) {
      const currentIndex = cursor;
      cursor += 1;
      try {
        results[currentIndex] = await mapper(items[currentIndex], currentIndex);
      } catch (error) {
        failures.push(error);
      }
    }
  });

  await Promise.all(workers);
  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
