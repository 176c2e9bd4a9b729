import type { DelimiterDetection } from '../model/Delimiter.js';

/**
 * Port for splitting delimited text into rows of fields.
 *
 * `rows()` consumes text chunks lazily and yields one array of raw fields per
 * non-blank row, in source order. Rows may span chunk boundaries.
 */
export interface SourceParser {
  rows(chunks: AsyncIterable<string>, delimiter: string): AsyncIterable<readonly string[]>;
  /**
   * Guess the field delimiter from the start of the input.
   *
   * @param complete - `true` when `sample` is the whole input, so its last line is not cut off.
   */
  detect(sample: string, complete: boolean): DelimiterDetection;
}
