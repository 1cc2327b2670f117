/**
 * Bounded worker pool
 *
 * `concurrency` workers pull from a shared cursor until the input is
 * drained. With one worker, items run strictly in input order.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>
): Promise<void> {
  const workerCount = Math.min(Math.max(1, Math.floor(concurrency) || 1), items.length);
  let cursor = 0;

  const workers = Array.from({ length: workerCount }, async () => {
    while (cursor < items.length) {
      const index = cursor++;
      await worker(items[index], index);
    }
  });

  await Promise.all(workers);
}
