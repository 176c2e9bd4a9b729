import { Readable } from 'node:stream';
import Papa from 'papaparse';
import type { SourceParser } from '../../domain/ports/SourceParser.js';
import type { DelimiterDetection } from '../../domain/model/Delimiter.js';
import { isBlankRow } from '../../domain/model/Record.js';
import { DelimiterDetector, type DelimiterDetectorOptions } from './DelimiterDetector.js';

function isRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((field) => typeof field === 'string');
}

/**
 * Delimited-text parser adapter using PapaParse's Node stream mode.
 *
 * Quoted fields may contain delimiters and line breaks, and rows may span
 * chunks. Blank and whitespace-only lines are skipped, while a row of empty
 * fields is kept. Fields are returned verbatim as text.
 */
export class CsvParser implements SourceParser {
  private readonly detector: DelimiterDetector;

  constructor(options?: DelimiterDetectorOptions) {
    this.detector = new DelimiterDetector(options);
  }

  async *rows(chunks: AsyncIterable<string>, delimiter: string): AsyncIterable<readonly string[]> {
    const input = Readable.from(chunks);
    const parser = Papa.parse(Papa.NODE_STREAM_INPUT, {
      delimiter,
      header: false,
      skipEmptyLines: false,
      dynamicTyping: false,
    });

    input.on('error', (error) => parser.destroy(error));
    input.pipe(parser);

    try {
      for await (const row of parser) {
        if (isRow(row) && !isBlankRow(row)) yield row;
      }
    } finally {
      input.unpipe(parser);
      input.destroy();
    }
  }

  detect(sample: string, complete: boolean): DelimiterDetection {
    return this.detector.detect(sample, complete);
  }
}
