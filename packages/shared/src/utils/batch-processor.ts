/**
 * BatchProcessor - Splits ordered runs into bounded, contiguous chunks.
 */
export class BatchProcessor {
  /**
   * Splits an array into consecutive batches of at most `batchSize` items.
   * Order is preserved and no batch spans two calls.
   *
   * @throws RangeError when batchSize is not a positive integer
   *
   * @example
   * ```typescript
   * BatchProcessor.createBatches([0, 1, 2], 2);
   * // [[0, 1], [2]]
   * ```
   */
  static createBatches<T>(items: readonly T[], batchSize: number): T[][] {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(
        `batchSize must be a positive integer, got ${batchSize}`,
      );
    }

    const batches: T[][] = [];
    for (let i = 0; i < items.length; i += batchSize) {
      batches.push(items.slice(i, i + batchSize));
    }
    return batches;
  }
}
