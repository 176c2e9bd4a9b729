import { describe, it, expect } from 'vitest';
import { StreamAssembler } from '../../../src/application/StreamAssembler.js';
import { ChunkedRecordSource } from '../../../src/application/ChunkedRecordSource.js';
import { ReportContext } from '../../../src/application/ReportContext.js';
import { resolveReportConfig } from '../../../src/domain/model/ReportConfig.js';
import { ColumnWidthEstimator } from '../../../src/domain/services/ColumnWidthEstimator.js';
import { RowFormatter } from '../../../src/domain/services/RowFormatter.js';
import { BufferSource } from '../../../src/infrastructure/sources/BufferSource.js';
import { CsvParser } from '../../../src/infrastructure/parsers/CsvParser.js';
import type { BatchFormattedEvent } from '../../../src/domain/events/DomainEvents.js';
import { collect } from '../../helpers/records.js';

function createAssembler(csv: string, batchSize: number) {
  const ctx = new ReportContext(resolveReportConfig({ outputDelimiter: '|', batchSize }));
  const formatted: BatchFormattedEvent[] = [];
  ctx.eventBus.on('batch:formatted', (e) => formatted.push(e));
  const assembler = new StreamAssembler(
    ctx,
    new ChunkedRecordSource(ctx, new BufferSource(csv), new CsvParser()),
    new ColumnWidthEstimator({ minWidth: 15, maxWidth: 30, percentile: 0.9 }),
    new RowFormatter('|'),
  );
  return { ctx, formatted, assembler };
}

describe('StreamAssembler', () => {
  it('should emit the header once, then every record in order', async () => {
    const { assembler } = createAssembler('k,v\na,1\nb,2\nc,3\n', 2);
    const lines = await collect(assembler.lines());

    expect(lines.map((l) => l.kind)).toEqual(['header', 'first', 'first', 'first']);
    expect(lines.map((l) => l.text.slice(0, 1))).toEqual(['k', 'a', 'b', 'c']);
    expect(lines.map((l) => l.recordIndex)).toEqual([undefined, 0, 1, 2]);
  });

  it('should size the header from the first batch and each batch independently', async () => {
    const { assembler, formatted } = createAssembler(`k,v\na,${'x'.repeat(20)}\nb,y\n`, 1);
    const lines = await collect(assembler.lines());

    expect(lines.map((l) => l.text)).toEqual([
      `${'k'.padEnd(15)}|${'v'.padEnd(20)}`,
      `${'a'.padEnd(15)}|${'x'.repeat(20)}`,
      `${'b'.padEnd(15)}|${'y'.padEnd(15)}`,
    ]);
    expect(formatted.map((e) => e.widths.get('v'))).toEqual([20, 15]);
  });

  it('should publish per-batch counts', async () => {
    const { assembler, formatted } = createAssembler(`id,notes\n1,short\n2,${'w '.repeat(20)}\n3,z\n`, 2);
    await collect(assembler.lines());

    expect(formatted.map((e) => [e.batchIndex, e.recordCount, e.lineCount])).toEqual([
      [0, 2, 4],
      [1, 1, 1],
    ]);
  });

  it('should count emitted lines and records on the context', async () => {
    const { assembler, ctx } = createAssembler('k,v\na,1\nb,2\n', 10);
    await collect(assembler.lines());

    expect(ctx.linesEmitted).toBe(3);
    expect(ctx.recordsEmitted).toBe(2);
  });
});
