/** Kind of an output line. */
export type LineKind = 'header' | 'first' | 'continuation';

/** A fully formatted output line, without its line terminator. */
export interface FormattedLine {
  readonly kind: LineKind;
  readonly text: string;
  /** Index of the record the line belongs to. Absent on the header line. */
  readonly recordIndex?: number;
}
