import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { createDecoder, decodeChunks } from './decodeText.js';

export interface BufferSourceOptions {
  /** File name for metadata. Default: `'buffer-input'`. */
  readonly fileName?: string;
  /** Encoding of byte input. Ignored for string input. Default: `'utf-8'`. */
  readonly encoding?: string;
}

/** Data source over in-memory text or bytes. */
export class BufferSource implements DataSource {
  private readonly content: string | Uint8Array;
  private readonly decoder: TextDecoder;
  private readonly meta: SourceMetadata;

  constructor(data: string | Uint8Array, options?: BufferSourceOptions) {
    this.content = data;
    this.decoder = createDecoder(options?.encoding ?? 'utf-8');
    this.meta = {
      fileName: options?.fileName ?? 'buffer-input',
      fileSize: typeof data === 'string' ? Buffer.byteLength(data) : data.byteLength,
      encoding: this.decoder.encoding,
    };
  }

  read(signal?: AbortSignal): AsyncIterable<string> {
    return decodeChunks(this.chunks(signal), this.decoder);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }

  private async *chunks(signal?: AbortSignal): AsyncIterable<string | Uint8Array> {
    const content = await Promise.resolve(this.content);
    if (signal?.aborted !== true) yield content;
  }
}
