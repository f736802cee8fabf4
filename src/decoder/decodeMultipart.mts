import type { DecodeEvent } from './events.mts';
import { MultipartDecoder, type MultipartDecoderOptions } from './MultipartDecoder.mts';

/**
 * Decodes a complete multipart body from a source of chunks (such as a Node.js `Readable`, a
 * `ReadableStream`, or an array of buffers).
 *
 * The source is read lazily as events are requested.
 */
export async function* decodeMultipart(
  source: AsyncIterable<Uint8Array> | Iterable<Uint8Array>,
  boundary: string,
  options?: MultipartDecoderOptions,
): AsyncGenerator<DecodeEvent, void, undefined> {
  const decoder = new MultipartDecoder(boundary, options);
  for await (const chunk of source) {
    yield* decoder.feed(chunk);
  }
  decoder.finish();
}
