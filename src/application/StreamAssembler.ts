import type { FormattedLine } from '../domain/model/FormattedLine.js';
import type { ColumnWidthEstimator } from '../domain/services/ColumnWidthEstimator.js';
import type { RowFormatter } from '../domain/services/RowFormatter.js';
import type { ChunkedRecordSource } from './ChunkedRecordSource.js';
import type { ReportContext } from './ReportContext.js';

/**
 * Drives record batches through width estimation and row formatting.
 *
 * Lines are produced one at a time as the consumer pulls them. The header is
 * emitted once, padded to the widths of the first batch. Batches are handled
 * strictly in arrival order and each batch's widths are dropped once its
 * lines have been pulled.
 */
export class StreamAssembler {
  private headerEmitted = false;

  constructor(
    private readonly ctx: ReportContext,
    private readonly records: ChunkedRecordSource,
    private readonly estimator: ColumnWidthEstimator,
    private readonly formatter: RowFormatter,
  ) {}

  async *lines(): AsyncIterable<FormattedLine> {
    for await (const batch of this.records.batches()) {
      const widths = this.estimator.estimate(batch);
      let lineCount = 0;

      if (!this.headerEmitted) {
        this.headerEmitted = true;
        lineCount++;
        this.ctx.linesEmitted++;
        yield this.formatter.formatHeader(batch.columns, widths);
      }

      for (const record of batch.records) {
        for (const line of this.formatter.format(record, batch.columns, widths)) {
          lineCount++;
          this.ctx.linesEmitted++;
          yield line;
        }
        this.ctx.recordsEmitted++;
      }

      this.ctx.emit({
        type: 'batch:formatted',
        batchIndex: batch.index,
        recordCount: batch.records.length,
        lineCount,
        widths,
      });
    }
  }
}
