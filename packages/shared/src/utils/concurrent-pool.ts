/**
 * Options for {@link ConcurrentPool.run}
 */
export interface ConcurrentPoolOptions {
  /** Once aborted, workers stop taking new items and the run rejects */
  abortSignal?: AbortSignal;
}

/**
 * ConcurrentPool - Worker pool utility for concurrent task execution.
 *
 * The pool keeps up to N workers active at all times. When a worker
 * finishes, it immediately picks up the next available item, so one slow
 * item never holds back the rest of the queue.
 */
export class ConcurrentPool {
  /**
   * Process items concurrently using a worker pool pattern.
   *
   * Results keep the original item order regardless of completion order.
   *
   * @param items - Array of items to process
   * @param concurrency - Maximum number of concurrent workers (at least 1)
   * @param processFn - Async function to process each item
   * @param options - Abort signal
   * @returns Array of results in the same order as the input items
   * @throws the abort reason when `abortSignal` fires before all items ran
   */
  static async run<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    options?: ConcurrentPoolOptions,
  ): Promise<R[]> {
    const results: R[] = new Array(items.length);
    const abortSignal = options?.abortSignal;
    let nextIndex = 0;

    async function worker(): Promise<void> {
      while (nextIndex < items.length) {
        abortSignal?.throwIfAborted();
        const index = nextIndex++;
        results[index] = await processFn(items[index], index);
      }
    }

    const workerCount = Math.min(Math.max(1, concurrency), items.length);
    const workers = Array.from({ length: workerCount }, () => worker());
    await Promise.all(workers);
    return results;
  }
}
