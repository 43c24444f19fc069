/**
 * Domain service that groups rows into fixed-size batches.
 *
 * Pure logic, no I/O. Bounds the size of each INSERT statement issued by a loader.
 */
export class BatchSplitter {
  constructor(private readonly batchSize: number) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error('Batch size must be a positive integer');
    }
  }

  /**
   * Split rows into batches of `batchSize`.
   *
   * Yields a `{ items, batchIndex }` tuple for each batch. The final batch may
   * contain fewer items than `batchSize`.
   */
  *split<T>(items: Iterable<T>): Iterable<{ readonly items: readonly T[]; readonly batchIndex: number }> {
    let buffer: T[] = [];
    let batchIndex = 0;

    for (const item of items) {
      buffer.push(item);

      if (buffer.length >= this.batchSize) {
        yield { items: buffer, batchIndex };
        buffer = [];
        batchIndex++;
      }
    }

    if (buffer.length > 0) {
      yield { items: buffer, batchIndex };
    }
  }
}
