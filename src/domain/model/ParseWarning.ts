/** Codes for per-row problems that are absorbed without stopping the stream. */
export type ParseWarningCode = 'MALFORMED_RECORD';

/** A skipped or repaired input row. */
export interface ParseWarning {
  readonly code: ParseWarningCode;
  readonly message: string;
  /** One-based position of the row among the non-blank rows of the source, header included. */
  readonly row: number;
  readonly expectedFields: number;
  readonly actualFields: number;
}

export function malformedRecordWarning(row: number, expectedFields: number, actualFields: number): ParseWarning {
  return {
    code: 'MALFORMED_RECORD',
    message: `Expected ${String(expectedFields)} fields in row ${String(row)}, saw ${String(actualFields)}`,
    row,
    expectedFields,
    actualFields,
  };
}
