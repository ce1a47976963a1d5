/**
 * ConcurrentPool - Worker pool utility for concurrent task execution.
 *
 * Keeps up to N workers busy at all times; when a worker finishes it
 * immediately pulls the next queued item. Results keep the input order.
 */
export class ConcurrentPool {
  /**
   * Process items concurrently using a worker pool pattern.
   *
   * When `signal` is aborted, workers stop taking new items and the pool
   * rejects with the signal's reason once in-flight items settle.
   *
   * @param items - Items to process
   * @param concurrency - Maximum number of concurrent workers (at least 1)
   * @param processFn - Async function applied to each item
   * @param onItemComplete - Optional callback fired after each item completes
   * @param signal - Optional abort signal that stops the queue
   * @returns Results in the same order as the input items
   */
  static async run<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    onItemComplete?: (result: R, index: number) => void,
    signal?: AbortSignal,
  ): Promise<R[]> {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(
        `Concurrency must be a positive integer, got ${concurrency}`,
      );
    }

    const results: R[] = new Array(items.length);
    let nextIndex = 0;

    async function worker(): Promise<void> {
      while (nextIndex < items.length && !signal?.aborted) {
        const index = nextIndex++;
        const result = await processFn(items[index], index);
        results[index] = result;
        onItemComplete?.(result, index);
      }
    }

    const workers = Array.from(
      { length: Math.min(concurrency, items.length) },
      () => worker(),
    );
    await Promise.all(workers);

    signal?.throwIfAborted();
    return results;
  }
}
