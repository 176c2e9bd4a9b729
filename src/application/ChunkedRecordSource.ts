import type { DataSource } from '../domain/ports/DataSource.js';
import type { SourceParser } from '../domain/ports/SourceParser.js';
import type { DelimiterDetection } from '../domain/model/Delimiter.js';
import type { RecordBatch } from '../domain/model/Batch.js';
import type { TextRecord } from '../domain/model/Record.js';
import { createBatch } from '../domain/model/Batch.js';
import { createTextRecord } from '../domain/model/Record.js';
import { normalizeColumnNames } from '../domain/model/Columns.js';
import { malformedRecordWarning } from '../domain/model/ParseWarning.js';
import { EmptyInputError } from '../domain/model/ReportError.js';
import { BatchSplitter } from '../domain/services/BatchSplitter.js';
import type { ReportContext } from './ReportContext.js';

interface Sample {
  readonly text: string;
  readonly chunks: readonly string[];
  /** `true` when the source ended while the sample was being filled. */
  readonly complete: boolean;
}

async function* replay(buffered: readonly string[], rest: AsyncIterator<string>): AsyncIterable<string> {
  yield* buffered;
  for (;;) {
    const next = await rest.next();
    if (next.done) return;
    yield next.value;
  }
}

/**
 * Reads a data source once and yields its records in batches.
 *
 * The first chunks are held back until the detection sample is full, then
 * replayed ahead of the rest of the stream. The first non-blank row is the
 * header. Rows whose field count differs from the header are recorded as
 * warnings and skipped, or padded when `shortRows` is `pad` and the row is
 * short. The source is released when iteration ends, fails or is abandoned.
 */
export class ChunkedRecordSource {
  constructor(
    private readonly ctx: ReportContext,
    private readonly source: DataSource,
    private readonly parser: SourceParser,
  ) {}

  /**
   * @throws EmptyInputError when no data record follows the header.
   * @throws DecodeFailureError when the source cannot be decoded.
   */
  async *batches(): AsyncIterable<RecordBatch> {
    const cancelled = this.ctx.abortController.signal;
    const release = new AbortController();
    const cancel = (): void => release.abort();
    cancelled.addEventListener('abort', cancel, { once: true });
    const iterator = this.source.read(release.signal)[Symbol.asyncIterator]();

    try {
      const sample = await this.takeSample(iterator);
      const detection = this.resolveDelimiter(sample);
      this.ctx.delimiter = detection;
      this.ctx.emit({ type: 'delimiter:detected', detection });

      const rows = this.parser.rows(replay(sample.chunks, iterator), detection.delimiter);
      const splitter = new BatchSplitter(this.ctx.config.batchSize);

      for await (const { records, batchIndex } of splitter.split(this.records(rows))) {
        this.ctx.batches = batchIndex + 1;
        yield createBatch(batchIndex, this.ctx.columns, records);
      }

      if (this.ctx.recordsRead === 0 && !cancelled.aborted) {
        throw new EmptyInputError();
      }
    } finally {
      cancelled.removeEventListener('abort', cancel);
      // The parser reads ahead, so a next() may still be pending on the source.
      release.abort();
      await iterator.return?.();
    }
  }

  private async *records(rows: AsyncIterable<readonly string[]>): AsyncIterable<TextRecord> {
    let header: readonly string[] | null = null;
    let row = 0;

    for await (const fields of rows) {
      row++;

      if (header === null) {
        header = normalizeColumnNames(fields);
        this.ctx.columns = header;
        continue;
      }

      const expected = header.length;
      const tooShort = fields.length < expected;
      if (fields.length !== expected) {
        this.ctx.recordWarning(malformedRecordWarning(row, expected, fields.length));
        if (!tooShort || this.ctx.config.shortRows === 'skip') continue;
      }

      yield createTextRecord(this.ctx.recordsRead++, row, fields, expected);
    }
  }

  private async takeSample(iterator: AsyncIterator<string>): Promise<Sample> {
    const chunks: string[] = [];
    let length = 0;
    let complete = false;

    while (length < this.ctx.config.sampleSize) {
      const next = await iterator.next();
      if (next.done) {
        complete = true;
        break;
      }
      chunks.push(next.value);
      length += next.value.length;
    }

    const text = chunks.join('');
    return { text: text.slice(0, this.ctx.config.sampleSize), chunks, complete: complete && text.length <= this.ctx.config.sampleSize };
  }

  private resolveDelimiter(sample: Sample): DelimiterDetection {
    const configured = this.ctx.config.inputDelimiter;
    if (configured !== undefined) {
      return { delimiter: configured, method: 'configured', columnCount: 0, consistency: 0 };
    }
    return this.parser.detect(sample.text, sample.complete);
  }
}
