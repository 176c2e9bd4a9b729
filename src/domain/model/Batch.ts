import type { TextRecord } from './Record.js';

/**
 * A bounded run of consecutive records. Column widths are estimated per batch,
 * so the batch boundary only bounds memory and never appears in the output.
 */
export interface RecordBatch {
  /** Zero-based position of the batch in the stream. */
  readonly index: number;
  readonly columns: readonly string[];
  readonly records: readonly TextRecord[];
}

/** Display width per column name, computed for one batch. */
export type ColumnWidths = ReadonlyMap<string, number>;

export function createBatch(index: number, columns: readonly string[], records: readonly TextRecord[]): RecordBatch {
  return { index, columns, records };
}

/** Width of `column`. Every column of a batch has one, so a miss is a programming error. */
export function widthOf(widths: ColumnWidths, column: string): number {
  const width = widths.get(column);
  if (width === undefined) {
    throw new RangeError(`No width computed for column '${column}'`);
  }
  return width;
}
