import type { ReadableStream } from 'node:stream/web';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { createDecoder, decodeChunks } from './decodeText.js';
import { untilAborted } from './untilAborted.js';

export interface StreamSourceOptions {
  /** File name for metadata. Default: `'stream-input'`. */
  readonly fileName?: string;
  /** File size in bytes for metadata (if known). */
  readonly fileSize?: number;
  /** Encoding for decoding byte chunks. Default: `'utf-8'`. */
  readonly encoding?: string;
}

type Chunk = string | Uint8Array;

/** Data source that wraps an `AsyncIterable` or a web `ReadableStream`. Ideal for upload bodies. */
export class StreamSource implements DataSource {
  private readonly stream: AsyncIterable<Chunk> | ReadableStream<Chunk>;
  private readonly decoder: TextDecoder;
  private readonly meta: SourceMetadata;
  private consumed = false;

  constructor(stream: AsyncIterable<Chunk> | ReadableStream<Chunk>, options?: StreamSourceOptions) {
    this.stream = stream;
    this.decoder = createDecoder(options?.encoding ?? 'utf-8');
    this.meta = {
      fileName: options?.fileName ?? 'stream-input',
      fileSize: options?.fileSize,
      encoding: this.decoder.encoding,
    };
  }

  read(signal?: AbortSignal): AsyncIterable<string> {
    if (this.consumed) {
      throw new Error('StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;

    const iterator = this.isReadableStream(this.stream)
      ? this.readerIterator(this.stream)
      : this.stream[Symbol.asyncIterator]();
    return decodeChunks(untilAborted(iterator, signal), this.decoder);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }

  private isReadableStream(stream: AsyncIterable<Chunk> | ReadableStream<Chunk>): stream is ReadableStream<Chunk> {
    return 'getReader' in stream && typeof stream.getReader === 'function';
  }

  /** Cancelling the reader settles a pending read, so `return()` never waits on the producer. */
  private readerIterator(stream: ReadableStream<Chunk>): AsyncIterator<Chunk> {
    const reader = stream.getReader();
    return {
      async next(): Promise<IteratorResult<Chunk>> {
        const result = await reader.read();
        return result.done ? { done: true, value: undefined } : { done: false, value: result.value };
      },
      async return(): Promise<IteratorResult<Chunk>> {
        await reader.cancel();
        reader.releaseLock();
        return { done: true, value: undefined };
      },
    };
  }
}
