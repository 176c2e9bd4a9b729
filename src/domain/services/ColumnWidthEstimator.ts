import type { RecordBatch, ColumnWidths } from '../model/Batch.js';
import { textLength } from './TextWrapper.js';

export interface ColumnWidthOptions {
  /** Lower bound applied to every column. */
  readonly minWidth: number;
  /** Upper bound for content-driven widths. A longer header still widens its column. */
  readonly maxWidth: number;
  /** Fraction between 0 and 1 selecting the content length statistic. */
  readonly percentile: number;
}

/**
 * Percentile of `values` with linear interpolation between the two closest
 * ranks, the rank being `(n - 1) * fraction` over the sorted values.
 */
export function percentile(values: readonly number[], fraction: number): number {
  if (values.length === 0) {
    throw new RangeError('Cannot take a percentile of an empty list');
  }

  const sorted = [...values].sort((a, b) => a - b);
  const rank = (sorted.length - 1) * fraction;
  const lower = sorted[Math.floor(rank)];
  const upper = sorted[Math.ceil(rank)];
  if (lower === undefined || upper === undefined) {
    throw new RangeError(`Percentile fraction out of range: ${String(fraction)}`);
  }

  return lower + (upper - lower) * (rank - Math.floor(rank));
}

/**
 * Computes a display width for every column of a batch.
 *
 * For each column the width is the header length, raised to the chosen
 * percentile of the non-empty cell lengths (truncated, and capped at
 * `maxWidth`), then raised to `minWidth`. Batches are measured independently.
 */
export class ColumnWidthEstimator {
  constructor(private readonly options: ColumnWidthOptions) {}

  estimate(batch: RecordBatch): ColumnWidths {
    const widths = new Map<string, number>();

    batch.columns.forEach((column, i) => {
      widths.set(column, this.columnWidth(column, this.cellLengths(batch, i)));
    });

    return widths;
  }

  private columnWidth(header: string, lengths: readonly number[]): number {
    const headerLength = textLength(header);
    const width =
      lengths.length === 0
        ? headerLength
        : Math.max(headerLength, Math.min(Math.trunc(percentile(lengths, this.options.percentile)), this.options.maxWidth));

    return Math.max(width, this.options.minWidth);
  }

  private cellLengths(batch: RecordBatch, column: number): number[] {
    const lengths: number[] = [];
    for (const record of batch.records) {
      const value = record.values[column];
      if (value !== null && value !== undefined) {
        lengths.push(textLength(value));
      }
    }
    return lengths;
  }
}
