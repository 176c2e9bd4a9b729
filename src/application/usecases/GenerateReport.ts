import type { FormattedLine } from '../../domain/model/FormattedLine.js';
import { ReportStatus } from '../../domain/model/ReportStatus.js';
import { isReportError } from '../../domain/model/ReportError.js';
import { ColumnWidthEstimator } from '../../domain/services/ColumnWidthEstimator.js';
import { RowFormatter } from '../../domain/services/RowFormatter.js';
import { ChunkedRecordSource } from '../ChunkedRecordSource.js';
import { StreamAssembler } from '../StreamAssembler.js';
import type { ReportContext } from '../ReportContext.js';

/** Use case: stream the formatted report, tracking the run's status and publishing its lifecycle events. */
export class GenerateReport {
  constructor(private readonly ctx: ReportContext) {}

  async *execute(): AsyncIterable<FormattedLine> {
    const source = this.ctx.source;
    const parser = this.ctx.parser;
    if (!source || !parser) {
      throw new Error('Source must be configured. Call .from(source) first.');
    }

    this.ctx.transitionTo(ReportStatus.RUNNING);
    this.ctx.startedAt = Date.now();

    const { config } = this.ctx;
    try {
      this.ctx.emit({ type: 'report:started', source: source.metadata() });

      const assembler = new StreamAssembler(
        this.ctx,
        new ChunkedRecordSource(this.ctx, source, parser),
        new ColumnWidthEstimator({
          minWidth: config.minColumnWidth,
          maxWidth: config.maxColumnWidth,
          percentile: config.percentile,
        }),
        new RowFormatter(config.outputDelimiter),
      );

      yield* assembler.lines();

      // A report abandoned mid-read ends early and is settled as cancelled below.
      if (!this.ctx.abortController.signal.aborted) {
        this.ctx.transitionTo(ReportStatus.COMPLETED);
        this.ctx.emit({ type: 'report:completed', summary: this.ctx.buildSummary() });
      }
    } catch (error) {
      this.ctx.transitionTo(ReportStatus.FAILED);
      this.ctx.emit({
        type: 'report:failed',
        code: isReportError(error) ? error.code : undefined,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      if (this.ctx.status === ReportStatus.RUNNING) {
        this.ctx.transitionTo(ReportStatus.CANCELLED);
        this.ctx.emit({ type: 'report:cancelled', summary: this.ctx.buildSummary() });
      }
    }
  }
}
