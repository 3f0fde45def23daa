export type PoolOptions = { signal?: AbortSignal };

export type PoolRun = { started: number; notStarted: number };

/**
 * Runs `worker` over `items` with at most `size` calls in flight.
 * Items are taken in order; once `signal` aborts no new item is started.
 * If a worker throws, no new items start and the first error is rethrown
 * after the in-flight calls settle.
 */
export async function runPool<T>(
  items: readonly T[],
  size: number,
  worker: (item: T, index: number) => Promise<void>,
  opts: PoolOptions = {},
): Promise<PoolRun> {
  let next = 0;
  let failed = false;
  let firstError: unknown;

  const lane = async () => {
    while (!failed && !opts.signal?.aborted && next < items.length) {
      const index = next++;
      try {
        await worker(items[index], index);
      } catch (e) {
        if (!failed) firstError = e;
        failed = true;
      }
    }
  };

  const lanes = Math.max(1, Math.min(Math.floor(size), items.length));
  await Promise.all(Array.from({ length: items.length ? lanes : 0 }, lane));
  if (failed) throw firstError;
  return { started: next, notStarted: items.length - next };
}
