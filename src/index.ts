// Main entry point
export { TabularReport } from './TabularReport.js';
export type { ToStreamOptions } from './TabularReport.js';

// Configuration
export { ReportConfigSchema, resolveReportConfig } from './domain/model/ReportConfig.js';
export type { ReportConfig, ReportOptions } from './domain/model/ReportConfig.js';
export {
  resolveDelimiterAlias,
  DEFAULT_CANDIDATE_DELIMITERS,
  FALLBACK_DELIMITER,
} from './domain/model/Delimiter.js';
export type { DelimiterDetection, DelimiterMethod } from './domain/model/Delimiter.js';

// Domain model
export type { CellValue, TextRecord } from './domain/model/Record.js';
export type { RecordBatch, ColumnWidths } from './domain/model/Batch.js';
export type { FormattedLine, LineKind } from './domain/model/FormattedLine.js';
export type { ParseWarning, ParseWarningCode } from './domain/model/ParseWarning.js';
export type { ReportSummary } from './domain/model/ReportSummary.js';
export { ReportStatus } from './domain/model/ReportStatus.js';
export {
  ReportError,
  ConfigurationInvalidError,
  EmptyInputError,
  DecodeFailureError,
  isReportError,
} from './domain/model/ReportError.js';
export type { ReportErrorCode, InvalidField } from './domain/model/ReportError.js';

// Domain services (for building custom pipelines)
export { ColumnWidthEstimator, percentile } from './domain/services/ColumnWidthEstimator.js';
export type { ColumnWidthOptions } from './domain/services/ColumnWidthEstimator.js';
export { RowFormatter } from './domain/services/RowFormatter.js';
export { BatchSplitter } from './domain/services/BatchSplitter.js';
export { wrapText, padCell, textLength } from './domain/services/TextWrapper.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { SourceParser } from './domain/ports/SourceParser.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  ReportStartedEvent,
  DelimiterDetectedEvent,
  RecordMalformedEvent,
  BatchFormattedEvent,
  ReportCompletedEvent,
  ReportCancelledEvent,
  ReportFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in)
export { CsvParser } from './infrastructure/parsers/CsvParser.js';
export { DelimiterDetector } from './infrastructure/parsers/DelimiterDetector.js';
export type { DelimiterDetectorOptions } from './infrastructure/parsers/DelimiterDetector.js';
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export type { BufferSourceOptions } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
