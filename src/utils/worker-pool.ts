/**
 * Runs task over items with at most `concurrency` in flight.
 * Workers stop pulling new items once shouldStop() returns true.
 */
export async function runWorkerPool<T>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<void>,
  shouldStop: () => boolean = () => false
): Promise<void> {
  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  let cursor = 0;

  async function worker(): Promise<void> {
    while (cursor < items.length && !shouldStop()) {
      const index = cursor++;
      await task(items[index], index);
    }
  }

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
}
