import { randomUUID } from 'node:crypto';
import type { ReportConfig } from '../domain/model/ReportConfig.js';
import type { DelimiterDetection } from '../domain/model/Delimiter.js';
import type { ParseWarning } from '../domain/model/ParseWarning.js';
import type { ReportSummary } from '../domain/model/ReportSummary.js';
import type { DataSource } from '../domain/ports/DataSource.js';
import type { SourceParser } from '../domain/ports/SourceParser.js';
import type { DomainEvent } from '../domain/events/DomainEvents.js';
import { ReportStatus, canTransition } from '../domain/model/ReportStatus.js';
import { EventBus } from './EventBus.js';

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An event as published by the engine, before the report id and timestamp are stamped on. */
export type EventBody = DistributiveOmit<DomainEvent, 'reportId' | 'timestamp'>;

/**
 * Mutable state of a single report run.
 *
 * Every `TabularReport` owns its own context, so concurrent reports share
 * nothing. Use cases and the streaming components receive the context and
 * update its counters as lines are produced.
 */
export class ReportContext {
  readonly config: ReportConfig;
  readonly eventBus = new EventBus();
  readonly reportId = randomUUID();
  /** Aborted when the consumer abandons the report without pulling its lines to the end. */
  readonly abortController = new AbortController();

  source: DataSource | null = null;
  parser: SourceParser | null = null;

  status: ReportStatus = ReportStatus.CREATED;
  delimiter: DelimiterDetection | null = null;
  columns: readonly string[] = [];
  recordsRead = 0;
  recordsEmitted = 0;
  linesEmitted = 0;
  batches = 0;
  readonly warnings: ParseWarning[] = [];
  startedAt?: number;
  finishedAt?: number;

  constructor(config: ReportConfig) {
    this.config = config;
  }

  /** Publish `event` stamped with this report's id and the current time. */
  emit(event: EventBody): void {
    this.eventBus.emit({ ...event, reportId: this.reportId, timestamp: Date.now() });
  }

  transitionTo(next: ReportStatus): void {
    if (!canTransition(this.status, next)) {
      throw new Error(`Invalid state transition: ${this.status} -> ${next}`);
    }
    this.status = next;
    if (next !== ReportStatus.RUNNING) {
      this.finishedAt = Date.now();
    }
  }

  recordWarning(warning: ParseWarning): void {
    this.warnings.push(warning);
    this.emit({ type: 'record:malformed', warning });
  }

  buildSummary(): ReportSummary {
    const end = this.finishedAt ?? Date.now();
    return {
      reportId: this.reportId,
      state: this.status,
      delimiter: this.delimiter,
      columns: this.columns,
      recordsRead: this.recordsRead,
      recordsEmitted: this.recordsEmitted,
      linesEmitted: this.linesEmitted,
      batches: this.batches,
      warnings: [...this.warnings],
      elapsedMs: this.startedAt === undefined ? 0 : end - this.startedAt,
    };
  }
}
