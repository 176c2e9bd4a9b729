import { Readable } from 'node:stream';
import type { ReportOptions } from './domain/model/ReportConfig.js';
import type { FormattedLine } from './domain/model/FormattedLine.js';
import type { ReportSummary } from './domain/model/ReportSummary.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { SourceParser } from './domain/ports/SourceParser.js';
import type { EventType, EventPayload } from './domain/events/DomainEvents.js';
import { resolveReportConfig } from './domain/model/ReportConfig.js';
import { ReportContext } from './application/ReportContext.js';
import { GenerateReport } from './application/usecases/GenerateReport.js';
import { CsvParser } from './infrastructure/parsers/CsvParser.js';

export interface ToStreamOptions {
  /** Appended to every line. Default: `'\n'`. */
  readonly lineTerminator?: string;
}

/**
 * Reformats delimited text into a column-aligned plain-text report.
 *
 * Options are validated on construction. A report reads its source once:
 * lines are produced lazily as the caller pulls them, and stopping early
 * releases the source.
 *
 * @example
 * ```ts
 * const report = new TabularReport({ outputDelimiter: '|' })
 *   .from(new FilePathSource('orders.csv'))
 *   .on('record:malformed', (e) => console.warn(e.warning.message));
 *
 * for await (const line of report.lines()) {
 *   process.stdout.write(line + '\n');
 * }
 * ```
 */
export class TabularReport {
  private readonly ctx: ReportContext;

  /** @throws ConfigurationInvalidError when an option is out of range. */
  constructor(options?: ReportOptions) {
    this.ctx = new ReportContext(resolveReportConfig(options));
  }

  /** Set the input. The parser defaults to a CSV parser trying the configured candidate delimiters. */
  from(source: DataSource, parser?: SourceParser): this {
    this.ctx.source = source;
    this.ctx.parser = parser ?? new CsvParser({ candidates: this.ctx.config.candidateDelimiters });
    return this;
  }

  /** Subscribe to a domain event. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe from a domain event. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Report lines with their kind and record index. Can be iterated once. */
  formattedLines(): AsyncIterable<FormattedLine> {
    return new GenerateReport(this.ctx).execute();
  }

  /** Report lines as text, without line terminators. Can be iterated once. */
  async *lines(): AsyncIterable<string> {
    for await (const line of this.formattedLines()) {
      yield line.text;
    }
  }

  /** Report as a Node `Readable` of terminated lines. Destroying the stream releases the source. */
  toStream(options?: ToStreamOptions): Readable {
    const terminator = options?.lineTerminator ?? '\n';
    const stream = Readable.from(this.terminatedLines(terminator), { objectMode: false });
    // The stream reads ahead, so closing it must reach a read still waiting on the source.
    stream.once('close', () => this.ctx.abortController.abort());
    return stream;
  }

  getSummary(): ReportSummary {
    return this.ctx.buildSummary();
  }

  private async *terminatedLines(terminator: string): AsyncIterable<string> {
    for await (const line of this.lines()) {
      yield line + terminator;
    }
  }
}
