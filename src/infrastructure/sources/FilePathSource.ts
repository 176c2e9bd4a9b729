import { createReadStream, statSync } from 'node:fs';
import { basename } from 'node:path';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { createDecoder, decodeChunks } from './decodeText.js';

export interface FilePathSourceOptions {
  /** Encoding of the file. Default: `'utf-8'`. */
  readonly encoding?: string;
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/** Data source that streams from a local file path using `createReadStream`. Node.js only. */
export class FilePathSource implements DataSource {
  private readonly filePath: string;
  private readonly encoding: string;
  private readonly highWaterMark: number;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.encoding = createDecoder(options?.encoding ?? 'utf-8').encoding;
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  read(signal?: AbortSignal): AsyncIterable<string> {
    return decodeChunks(this.chunks(signal), createDecoder(this.encoding));
  }

  metadata(): SourceMetadata {
    const stats = statSync(this.filePath);
    return {
      fileName: basename(this.filePath),
      fileSize: stats.size,
      encoding: this.encoding,
    };
  }

  /** Aborting `signal` destroys the file stream, which ends the iteration. */
  private async *chunks(signal?: AbortSignal): AsyncIterable<Uint8Array> {
    const stream = createReadStream(this.filePath, { highWaterMark: this.highWaterMark, signal });
    try {
      for await (const chunk of stream) {
        if (chunk instanceof Uint8Array) yield chunk;
      }
    } catch (error) {
      if (signal?.aborted !== true) throw error;
    } finally {
      stream.destroy();
    }
  }
}
