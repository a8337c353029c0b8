export interface PoolResult {
  started: number;
  stoppedEarly: boolean;
}

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight. The stop
 * signal is checked before each item is taken; items already running are allowed
 * to finish.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal
): Promise<PoolResult> {
  let next = 0;
  const size = Math.max(1, Math.min(Math.floor(concurrency), items.length));

  const loop = async (): Promise<void> => {
    while (next < items.length && !signal?.aborted) {
      const index = next;
      next += 1;
      await worker(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: size }, () => loop()));

  return { started: next, stoppedEarly: next < items.length };
}
