/**
 * Map over `items` with at most `workers` calls in flight. Results keep the
 * order of `items`. After the first rejection no new items are started and
 * the returned promise rejects with that error.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  workers: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  let failed = false;

  async function processNext(): Promise<void> {
    while (!failed && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  }

  const workerPromises: Promise<void>[] = [];
  for (let i = 0; i < Math.min(Math.max(1, workers), items.length); i++) {
    workerPromises.push(processNext());
  }

  await Promise.all(workerPromises);
  return results;
}
