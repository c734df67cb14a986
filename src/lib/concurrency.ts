/**
 * Bounded worker pool. At most `concurrency` workers pull items in order;
 * the worker gets each item's original index so callers can store results
 * positionally regardless of completion order.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>
): Promise<void> {
  if (items.length === 0) return;
  let cursor = 0;
  const size = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  await Promise.all(
    Array.from({ length: size }).map(async () => {
      while (true) {
        const index = cursor;
        cursor += 1;
        if (index >= items.length) break;
        await worker(items[index], index);
      }
    })
  );
}
