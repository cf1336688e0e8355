export type PoolResult<T, R> =
  | { item: T; status: 'fulfilled'; value: R }
  | { item: T; status: 'rejected'; error: Error }
  | { item: T; status: 'skipped' };

export interface PoolOptions {
  /**
   * Checked before each item is taken. Once it returns true no further
   * items start; items already running are awaited.
   */
  shouldStop?: () => boolean;
}

export async function processPool<T, R>(
  items: readonly T[],
  handler: (item: T, index: number) => Promise<R>,
  maxConcurrency: number,
  options: PoolOptions = {},
): Promise<Array<PoolResult<T, R>>> {
  if (items.length === 0) {
    return [];
  }

  const requestedConcurrency = Number.isFinite(maxConcurrency)
    ? Math.floor(maxConcurrency)
    : 1;
  const concurrency = Math.max(1, Math.min(requestedConcurrency, items.length));
  let nextIndex = 0;
  const results: Array<PoolResult<T, R>> = items.map((item) => ({
    item,
    status: 'skipped',
  }));

  const worker = async (): Promise<void> => {
    while (true) {
      if (options.shouldStop?.()) {
        return;
      }
      const currentIndex = nextIndex++;
      if (currentIndex >= items.length) {
        return;
      }

      const item = items[currentIndex];
      try {
        const value = await handler(item, currentIndex);
        results[currentIndex] = { item, status: 'fulfilled', value };
      } catch (error) {
        const resolvedError =
          error instanceof Error ? error : new Error(String(error));
        results[currentIndex] = {
          item,
          status: 'rejected',
          error: resolvedError,
        };
      }
    }
  };

  await Promise.all(Array.from({ length: concurrency }, () => worker()));
  return results;
}
