import { ConfigurationInvalidError, DecodeFailureError } from '../../domain/model/ReportError.js';

/**
 * Create a strict decoder for `encoding`. Any WHATWG encoding label is accepted.
 *
 * @throws ConfigurationInvalidError when the label is unknown.
 */
export function createDecoder(encoding: string): TextDecoder {
  try {
    return new TextDecoder(encoding, { fatal: true });
  } catch (error) {
    throw new ConfigurationInvalidError(`Unsupported encoding '${encoding}'`, [{ path: '/encoding', message: 'Unknown encoding label' }], {
      cause: error,
    });
  }
}

function decodeOrFail(decoder: TextDecoder, bytes: Uint8Array | undefined, stream: boolean): string {
  try {
    return decoder.decode(bytes, { stream });
  } catch (error) {
    throw new DecodeFailureError(decoder.encoding, `Input is not valid ${decoder.encoding} text`, { cause: error });
  }
}

/**
 * Decode a stream of byte or string chunks into text.
 *
 * Multi-byte sequences may straddle chunks. String chunks pass through
 * unchanged. A byte order mark at the start is dropped.
 *
 * @throws DecodeFailureError at the first chunk holding invalid bytes.
 */
export async function* decodeChunks(
  chunks: AsyncIterable<string | Uint8Array>,
  decoder: TextDecoder,
): AsyncIterable<string> {
  let first = true;

  for await (const chunk of chunks) {
    let text = typeof chunk === 'string' ? chunk : decodeOrFail(decoder, chunk, true);
    if (first && text.length > 0) {
      text = text.replace(/^\uFEFF/, '');
      first = false;
    }
    if (text.length > 0) yield text;
  }

  const tail = decodeOrFail(decoder, undefined, false);
  if (tail.length > 0) yield tail;
}
