/** Machine-readable codes for stream-level failures. */
export type ReportErrorCode = 'CONFIGURATION_INVALID' | 'EMPTY_INPUT' | 'DECODE_FAILURE';

/** A single rejected configuration field. `path` is a JSON pointer into the options object. */
export interface InvalidField {
  readonly path: string;
  readonly message: string;
}

/** Base class for every error the report engine raises to its caller. */
export class ReportError extends Error {
  constructor(
    public readonly code: ReportErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ReportError';
  }
}

/** Options, delimiter or encoding rejected before any input is read. */
export class ConfigurationInvalidError extends ReportError {
  constructor(
    message: string,
    public readonly fields: readonly InvalidField[] = [],
    options?: ErrorOptions,
  ) {
    super('CONFIGURATION_INVALID', message, options);
    this.name = 'ConfigurationInvalidError';
  }
}

/** The input held no data records after its header row. */
export class EmptyInputError extends ReportError {
  constructor(message = 'The input contains no data records') {
    super('EMPTY_INPUT', message);
    this.name = 'EmptyInputError';
  }
}

/**
 * The input bytes could not be decoded with the declared encoding.
 *
 * Lines emitted before this error are a partial report and must not be
 * treated as a complete result.
 */
export class DecodeFailureError extends ReportError {
  constructor(
    public readonly encoding: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super('DECODE_FAILURE', message, options);
    this.name = 'DecodeFailureError';
  }
}

/** Narrow an unknown thrown value to a report error. */
export function isReportError(error: unknown): error is ReportError {
  return error instanceof ReportError;
}
