/** A cell as read from the source: always text, `null` when the field is empty. */
export type CellValue = string | null;

/**
 * One data row of the input.
 *
 * `values` is positional and aligned with the column list of the batch the
 * record belongs to. Column identity and order are fixed by the header row.
 */
export interface TextRecord {
  /** Zero-based index among accepted data records. */
  readonly index: number;
  /** One-based position of the row among the non-blank rows of the source, header included. */
  readonly row: number;
  readonly values: readonly CellValue[];
}

/**
 * A line holding nothing but whitespace parses to one blank field. Rows of
 * several empty fields, such as `,,`, are records.
 */
export function isBlankRow(fields: readonly string[]): boolean {
  return fields.length === 1 && (fields[0] ?? '').trim().length === 0;
}

/** Trim leading whitespace; an empty result is an absent value. */
export function toCellValue(field: string): CellValue {
  const trimmed = field.trimStart();
  return trimmed.length === 0 ? null : trimmed;
}

/**
 * Build a record from parsed fields, padding missing trailing fields with `null`
 * up to `columnCount`.
 */
export function createTextRecord(
  index: number,
  row: number,
  fields: readonly string[],
  columnCount: number,
): TextRecord {
  const values: CellValue[] = fields.map(toCellValue);
  while (values.length < columnCount) {
    values.push(null);
  }
  return { index, row, values };
}

/** Display text of a cell. */
export function cellText(value: CellValue | undefined): string {
  return value ?? '';
}
