import type { DelimiterDetection } from '../model/Delimiter.js';
import type { ParseWarning } from '../model/ParseWarning.js';
import type { ColumnWidths } from '../model/Batch.js';
import type { ReportErrorCode } from '../model/ReportError.js';
import type { ReportSummary } from '../model/ReportSummary.js';
import type { SourceMetadata } from '../ports/DataSource.js';

/** Emitted when the first line is pulled and the source starts being read. */
export interface ReportStartedEvent {
  readonly type: 'report:started';
  readonly reportId: string;
  readonly source: SourceMetadata;
  readonly timestamp: number;
}

/** Emitted once the input delimiter is known, whether configured, detected or the fallback. */
export interface DelimiterDetectedEvent {
  readonly type: 'delimiter:detected';
  readonly reportId: string;
  readonly detection: DelimiterDetection;
  readonly timestamp: number;
}

/** Emitted for each input row skipped or padded because its field count differs from the header. */
export interface RecordMalformedEvent {
  readonly type: 'record:malformed';
  readonly reportId: string;
  readonly warning: ParseWarning;
  readonly timestamp: number;
}

/** Emitted after every line of a batch has been pulled by the consumer. */
export interface BatchFormattedEvent {
  readonly type: 'batch:formatted';
  readonly reportId: string;
  readonly batchIndex: number;
  readonly recordCount: number;
  readonly lineCount: number;
  readonly widths: ColumnWidths;
  readonly timestamp: number;
}

/** Emitted when the last line has been pulled. */
export interface ReportCompletedEvent {
  readonly type: 'report:completed';
  readonly reportId: string;
  readonly summary: ReportSummary;
  readonly timestamp: number;
}

/** Emitted when the consumer stops pulling before the end of the input. */
export interface ReportCancelledEvent {
  readonly type: 'report:cancelled';
  readonly reportId: string;
  readonly summary: ReportSummary;
  readonly timestamp: number;
}

/** Emitted before a stream-level error propagates to the consumer. */
export interface ReportFailedEvent {
  readonly type: 'report:failed';
  readonly reportId: string;
  /** Set for the engine's own error conditions. */
  readonly code?: ReportErrorCode;
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | ReportStartedEvent
  | DelimiterDetectedEvent
  | RecordMalformedEvent
  | BatchFormattedEvent
  | ReportCompletedEvent
  | ReportCancelledEvent
  | ReportFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
