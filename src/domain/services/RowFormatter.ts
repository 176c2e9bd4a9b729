import type { ColumnWidths } from '../model/Batch.js';
import type { FormattedLine } from '../model/FormattedLine.js';
import type { TextRecord } from '../model/Record.js';
import { widthOf } from '../model/Batch.js';
import { cellText } from '../model/Record.js';
import { padCell, wrapText } from './TextWrapper.js';

/**
 * Lays out records as fixed-width lines.
 *
 * The first line of a record joins the padded cells with the output
 * delimiter. Wrapped overflow goes on continuation lines whose cells are
 * separated by a single space, so the delimiter appears once per record.
 */
export class RowFormatter {
  constructor(private readonly delimiter: string) {}

  formatHeader(columns: readonly string[], widths: ColumnWidths): FormattedLine {
    return {
      kind: 'header',
      text: columns.map((column) => padCell(column, widthOf(widths, column))).join(this.delimiter),
    };
  }

  format(record: TextRecord, columns: readonly string[], widths: ColumnWidths): FormattedLine[] {
    const columnWidths = columns.map((column) => widthOf(widths, column));
    const wrapped = columns.map((_, i) => wrapText(cellText(record.values[i]), columnWidths[i] ?? 1));
    const lineCount = Math.max(1, ...wrapped.map((segments) => segments.length));

    const lineAt = (line: number): string[] =>
      wrapped.map((segments, i) => padCell(segments[line] ?? '', columnWidths[i] ?? 0));

    const lines: FormattedLine[] = [
      { kind: 'first', text: lineAt(0).join(this.delimiter), recordIndex: record.index },
    ];
    for (let line = 1; line < lineCount; line++) {
      lines.push({ kind: 'continuation', text: lineAt(line).join(' '), recordIndex: record.index });
    }

    return lines;
  }
}
