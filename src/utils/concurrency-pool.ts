/**
 * Bounded-parallelism helper.
 *
 * Runs `worker` over `items` with at most `limit` calls in flight and
 * returns the results in input order. The first rejection is rethrown once
 * every started worker has settled, so no task is left running in the
 * background.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  let nextIndex = 0;
  const failures: unknown[] = [];

  async function drain(): Promise<void> {
    while (failures.length === 0 && nextIndex < items.length) {
      const index = nextIndex++;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        failures.push(error);
      }
    }
  }

  const runners: Promise<void>[] = [];
  for (let i = 0; i < workerCount; i++) {
    runners.push(drain());
  }
  await Promise.all(runners);

  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}
