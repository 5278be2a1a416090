import type { CancellationToken } from "../ports/cancellation";

export type PoolOutcome<R> = {
  /** Indexed like the input; holes for items never started because of cancellation. */
  results: Array<R | undefined>;
  started: number;
  cancelled: boolean;
};

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Cancellation is checked before each item is picked up; items already
 * running are allowed to finish. A worker rejection stops new pickups and
 * is rethrown once every in-flight call has settled.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  cancellation?: CancellationToken
): Promise<PoolOutcome<R>> {
  const results: Array<R | undefined> = new Array<R | undefined>(items.length);
  let next = 0;
  let cancelled = false;
  let failure: { error: unknown } | undefined;

  const lane = async () => {
    while (next < items.length && !failure) {
      if (cancellation?.isCancellationRequested) {
        cancelled = true;
        return;
      }
      const index = next++;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        failure ??= { error };
        return;
      }
    }
  };

  const lanes = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));

  if (failure) throw failure.error;
  return { results, started: next, cancelled };
}
