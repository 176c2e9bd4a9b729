import { describe, it, expect } from 'vitest';
import { resolveReportConfig } from '../../../src/domain/model/ReportConfig.js';
import { ConfigurationInvalidError } from '../../../src/domain/model/ReportError.js';
import type { ReportOptions } from '../../../src/domain/model/ReportConfig.js';

function rejectedPaths(options: ReportOptions): string[] {
  try {
    resolveReportConfig(options);
  } catch (error) {
    if (error instanceof ConfigurationInvalidError) {
      return error.fields.map((field) => field.path);
    }
    throw error;
  }
  return [];
}

describe('resolveReportConfig', () => {
  it('should apply defaults', () => {
    expect(resolveReportConfig()).toEqual({
      outputDelimiter: '\t',
      candidateDelimiters: [',', ';', '\t', '|'],
      batchSize: 1000,
      minColumnWidth: 15,
      maxColumnWidth: 30,
      percentile: 0.9,
      sampleSize: 1024,
      shortRows: 'skip',
    });
  });

  it('should keep provided values', () => {
    const config = resolveReportConfig({ outputDelimiter: '|', batchSize: 5, inputDelimiter: ';', shortRows: 'pad' });

    expect(config.outputDelimiter).toBe('|');
    expect(config.batchSize).toBe(5);
    expect(config.inputDelimiter).toBe(';');
    expect(config.shortRows).toBe('pad');
  });

  it('should not mutate the options object', () => {
    const options: ReportOptions = { batchSize: 10 };
    resolveReportConfig(options);

    expect(options).toEqual({ batchSize: 10 });
  });

  it('should reject a batch size below 1', () => {
    expect(() => resolveReportConfig({ batchSize: 0 })).toThrow(ConfigurationInvalidError);
    expect(rejectedPaths({ batchSize: 0 })).toContain('/batchSize');
  });

  it('should reject a fractional batch size', () => {
    expect(rejectedPaths({ batchSize: 1.5 })).toContain('/batchSize');
  });

  it('should reject a percentile outside 0..1', () => {
    expect(rejectedPaths({ percentile: 1.5 })).toContain('/percentile');
  });

  it('should reject a multi-character output delimiter', () => {
    expect(rejectedPaths({ outputDelimiter: '||' })).toEqual(['/outputDelimiter']);
  });

  it('should reject a line break as output delimiter', () => {
    expect(rejectedPaths({ outputDelimiter: '\n' })).toEqual(['/outputDelimiter']);
  });

  it('should accept a single astral character as output delimiter', () => {
    expect(resolveReportConfig({ outputDelimiter: '😀' }).outputDelimiter).toBe('😀');
  });

  it('should reject a ceiling below the floor', () => {
    expect(rejectedPaths({ minColumnWidth: 20, maxColumnWidth: 10 })).toEqual(['/maxColumnWidth']);
  });

  it('should reject invalid candidate delimiters', () => {
    expect(rejectedPaths({ candidateDelimiters: [',', 'ab'] })).toEqual(['/candidateDelimiters/1']);
  });

  it('should report every rejected field at once', () => {
    expect(rejectedPaths({ outputDelimiter: '::', inputDelimiter: '\r', minColumnWidth: 9, maxColumnWidth: 4 })).toEqual([
      '/outputDelimiter',
      '/inputDelimiter',
      '/maxColumnWidth',
    ]);
  });

  it('should expose the error code', () => {
    try {
      resolveReportConfig({ sampleSize: 0 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationInvalidError);
      expect(error).toMatchObject({ code: 'CONFIGURATION_INVALID', name: 'ConfigurationInvalidError' });
    }
  });
});
