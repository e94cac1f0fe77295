/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight. After the first
 * failure no new items are started and the returned promise rejects with that error.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>
): Promise<void> {
  if (items.length === 0) {
    return;
  }

  const safeConcurrency = Math.max(1, concurrency);
  let current = 0;
  let failed = false;

  const runners = Array.from({ length: Math.min(safeConcurrency, items.length) }, async () => {
    while (true) {
      const index = current;
      current += 1;
      if (failed || index >= items.length) {
        break;
      }

      const item = items[index];
      if (item === undefined) {
        break;
      }
      try {
        await worker(item, index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  });

  await Promise.all(runners);
}

export function toBatches<T>(items: readonly T[], size: number): T[][] {
  const safeSize = Math.max(1, size);
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += safeSize) {
    batches.push(items.slice(start, start + safeSize));
  }
  return batches;
}
