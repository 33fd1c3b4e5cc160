/**
 * Bounded worker pool.
 *
 * Runs `worker` over `items` with at most `size` in flight and returns the
 * results in the order they completed. Workers hand back values only; the
 * caller applies them once every worker has finished.
 */

/** Upper bound on the automatic pool size. */
export const MAX_AUTO_WORKERS = 32;

/**
 * Resolve the pool size: an explicit positive override wins, otherwise one
 * worker per item capped at MAX_AUTO_WORKERS.
 */
export function resolvePoolSize(itemCount: number, override?: number): number {
  if (override !== undefined && override > 0) {
    return override;
  }
  return Math.max(1, Math.min(MAX_AUTO_WORKERS, itemCount));
}

export async function runPool<T, R>(
  items: readonly T[],
  size: number,
  worker: (item: T) => Promise<R>,
): Promise<R[]> {
  const completed: R[] = [];
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const item = items[next++];
      if (item === undefined) break;
      completed.push(await worker(item));
    }
  };

  const lanes = Array.from({ length: Math.min(size, items.length) }, () => lane());
  await Promise.all(lanes);
  return completed;
}
