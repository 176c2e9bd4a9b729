import Papa from 'papaparse';
import type { DelimiterDetection } from '../../domain/model/Delimiter.js';
import { DEFAULT_CANDIDATE_DELIMITERS, FALLBACK_DELIMITER } from '../../domain/model/Delimiter.js';
import { isBlankRow } from '../../domain/model/Record.js';

export interface DelimiterDetectorOptions {
  /** Delimiters to try, in order of preference for ties. */
  readonly candidates?: readonly string[];
  /** Maximum number of non-blank sample lines examined. Default: `10`. */
  readonly maxLines?: number;
  /** Share of lines that must agree on the field count. Default: `0.9`. */
  readonly minConsistency?: number;
}

interface CandidateScore {
  readonly delimiter: string;
  readonly columnCount: number;
  readonly consistency: number;
}

/**
 * Guesses the field delimiter of a delimited text sample.
 *
 * Each candidate is parsed over the sample lines with PapaParse. A candidate
 * qualifies when its most common field count is above one and at least
 * `minConsistency` of the lines share it. The best qualifying candidate wins
 * on consistency, then on column count, then on candidate order. Otherwise
 * the result is the comma fallback. Detection never throws.
 */
export class DelimiterDetector {
  private readonly candidates: readonly string[];
  private readonly maxLines: number;
  private readonly minConsistency: number;

  constructor(options?: DelimiterDetectorOptions) {
    this.candidates = options?.candidates ?? DEFAULT_CANDIDATE_DELIMITERS;
    this.maxLines = options?.maxLines ?? 10;
    this.minConsistency = options?.minConsistency ?? 0.9;
  }

  detect(sample: string, complete: boolean): DelimiterDetection {
    const text = complete ? sample : this.dropPartialLine(sample);
    let best: CandidateScore | null = null;

    for (const delimiter of this.candidates) {
      const score = this.score(text, delimiter);
      if (score.columnCount < 2 || score.consistency < this.minConsistency) continue;
      if (
        best === null ||
        score.consistency > best.consistency ||
        (score.consistency === best.consistency && score.columnCount > best.columnCount)
      ) {
        best = score;
      }
    }

    if (best === null) {
      return { delimiter: FALLBACK_DELIMITER, method: 'fallback', columnCount: 0, consistency: 0 };
    }
    return { ...best, method: 'detected' };
  }

  private score(text: string, delimiter: string): CandidateScore {
    const rows = Papa.parse<string[]>(text, { delimiter, skipEmptyLines: false })
      .data.filter((row) => !isBlankRow(row))
      .slice(0, this.maxLines);

    const frequencies = new Map<number, number>();
    for (const row of rows) {
      frequencies.set(row.length, (frequencies.get(row.length) ?? 0) + 1);
    }

    let columnCount = 0;
    let lines = 0;
    for (const [count, frequency] of frequencies) {
      if (frequency > lines || (frequency === lines && count > columnCount)) {
        columnCount = count;
        lines = frequency;
      }
    }

    return {
      delimiter,
      columnCount,
      consistency: rows.length === 0 ? 0 : lines / rows.length,
    };
  }

  /** Cut a truncated sample back to its last complete line, when it has one. */
  private dropPartialLine(sample: string): string {
    const end = Math.max(sample.lastIndexOf('\n'), sample.lastIndexOf('\r'));
    return end > 0 ? sample.slice(0, end) : sample;
  }
}
