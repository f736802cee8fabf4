import { internalBoundaryMarker } from '../core/boundary.mts';
import {
  internalEncodePartHead,
  internalTerminalBoundary,
  internalToBuffer,
  type AsyncBodySource,
  type PartDescriptor,
} from './partHead.mts';

/**
 * Like `encode`, but bodies (and the list of parts itself) may also be async iterables, such as
 * Node.js `Readable` streams or `ReadableStream`s.
 */
export function encodeAsync(
  boundary: string,
  parts:
    | Iterable<PartDescriptor<AsyncBodySource>>
    | AsyncIterable<PartDescriptor<AsyncBodySource>>,
): AsyncGenerator<Buffer, void, undefined> {
  return internalEncodeAsync(internalBoundaryMarker(boundary), parts);
}

async function* internalEncodeAsync(
  marker: Buffer,
  parts:
    | Iterable<PartDescriptor<AsyncBodySource>>
    | AsyncIterable<PartDescriptor<AsyncBodySource>>,
): AsyncGenerator<Buffer, void, undefined> {
  for await (const part of parts) {
    yield internalEncodePartHead(marker, part);
    const { body } = part;
    if (typeof body === 'string' || body instanceof Uint8Array) {
      const data = internalToBuffer(body);
      if (data.byteLength) {
        yield data;
      }
      continue;
    }
    for await (const chunk of body) {
      const data = internalToBuffer(chunk);
      if (data.byteLength) {
        yield data;
      }
    }
  }
  yield internalTerminalBoundary(marker);
}
