import type { ReportStatus } from './ReportStatus.js';
import type { DelimiterDetection } from './Delimiter.js';
import type { ParseWarning } from './ParseWarning.js';

/** Counters and outcome of a report run. */
export interface ReportSummary {
  readonly reportId: string;
  readonly state: ReportStatus;
  /** `null` until the input has been sampled. */
  readonly delimiter: DelimiterDetection | null;
  readonly columns: readonly string[];
  /** Data records accepted from the source. */
  readonly recordsRead: number;
  /** Records whose lines have all been emitted. */
  readonly recordsEmitted: number;
  readonly linesEmitted: number;
  readonly batches: number;
  readonly warnings: readonly ParseWarning[];
  readonly elapsedMs: number;
}
