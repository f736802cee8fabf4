import { internalBoundaryMarker } from '../core/boundary.mts';
import {
  internalEncodePartHead,
  internalTerminalBoundary,
  internalToBuffer,
  type BodySource,
  type PartDescriptor,
} from './partHead.mts';

/**
 * Encodes the parts as a `multipart/form-data` body, one chunk at a time.
 *
 * The body is produced lazily as the returned generator is consumed, so bodies can be streamed
 * without holding the whole message in memory. The generator (and any iterable bodies) can only
 * be consumed once.
 *
 * The caller must ensure that the boundary does not occur in any of the bodies.
 *
 * @example
 * ```
 * const body = Readable.from(encode(boundary, [
 *   { name: 'title', body: 'Holiday' },
 *   { name: 'photo', filename: 'beach.jpg', contentType: 'image/jpeg', body: imageBytes },
 * ]));
 * ```
 */
export function encode(
  boundary: string,
  parts: Iterable<PartDescriptor>,
): Generator<Buffer, void, undefined> {
  return internalEncode(internalBoundaryMarker(boundary), parts);
}

function* internalEncode(
  marker: Buffer,
  parts: Iterable<PartDescriptor>,
): Generator<Buffer, void, undefined> {
  for (const part of parts) {
    yield internalEncodePartHead(marker, part);
    yield* bodyChunks(part.body);
  }
  yield internalTerminalBoundary(marker);
}

function* bodyChunks(body: BodySource): Generator<Buffer, void, undefined> {
  if (typeof body === 'string' || body instanceof Uint8Array) {
    const data = internalToBuffer(body);
    if (data.byteLength) {
      yield data;
    }
    return;
  }
  for (const chunk of body) {
    const data = internalToBuffer(chunk);
    if (data.byteLength) {
      yield data;
    }
  }
}

/**
 * Calculates the exact size of the body which `encode` would produce, for use as a
 * Content-Length. Returns `undefined` if any body is an iterable (and so has an unknown length).
 */
export function getEncodedLength(
  boundary: string,
  parts: Iterable<PartDescriptor<unknown>>,
): number | undefined {
  const marker = internalBoundaryMarker(boundary);
  let length = 0;
  for (const part of parts) {
    const { body } = part;
    if (typeof body === 'string') {
      length += Buffer.byteLength(body, 'utf-8');
    } else if (body instanceof Uint8Array) {
      length += body.byteLength;
    } else {
      return undefined;
    }
    length += internalEncodePartHead(marker, part).byteLength;
  }
  return length + internalTerminalBoundary(marker).byteLength;
}
