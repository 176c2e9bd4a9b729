import type { TextRecord } from '../model/Record.js';

/**
 * Domain service that groups a stream of records into fixed-size batches.
 *
 * Pure logic with no I/O. Yields each batch as soon as it fills
 * up, so at most `batchSize` records are held at a time.
 */
export class BatchSplitter {
  constructor(private readonly batchSize: number) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError('Batch size must be a positive integer');
    }
  }

  /**
   * Split a stream of records into batches of `batchSize`.
   *
   * The final batch may contain fewer records than `batchSize`.
   */
  async *split(
    records: AsyncIterable<TextRecord>,
  ): AsyncIterable<{ readonly records: readonly TextRecord[]; readonly batchIndex: number }> {
    let buffer: TextRecord[] = [];
    let batchIndex = 0;

    for await (const record of records) {
      buffer.push(record);

      if (buffer.length >= this.batchSize) {
        yield { records: buffer, batchIndex };
        buffer = [];
        batchIndex++;
      }
    }

    if (buffer.length > 0) {
      yield { records: buffer, batchIndex };
    }
  }
}
