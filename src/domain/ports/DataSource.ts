/** Metadata about the data source (optional, for events and diagnostics). */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
  /** Text encoding the source decodes its bytes with. */
  readonly encoding: string;
}

/**
 * Port for reading decoded text from any origin (file, buffer, stream).
 *
 * `read()` yields text chunks with no regard for line boundaries. A source
 * whose bytes cannot be decoded throws `DecodeFailureError` from the iterator
 * at the point of failure. Ending the iteration early (`return()`) must release
 * the underlying resource. Aborting `signal` must release it too, even while a
 * read is still waiting on the producer, and ends the iteration.
 */
export interface DataSource {
  read(signal?: AbortSignal): AsyncIterable<string>;
  metadata(): SourceMetadata;
}
