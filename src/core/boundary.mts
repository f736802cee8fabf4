import { parseContentType } from '../headers/contentType.mts';
import { DecodeError } from './errors.mts';

// https://datatracker.ietf.org/doc/html/rfc2046#section-5.1.1
export const MAX_BOUNDARY_BYTES = 70;

/**
 * Checks the boundary is usable and returns the marker which precedes every boundary line
 * (`CRLF "--" boundary`).
 */
export function internalBoundaryMarker(boundary: string): Buffer {
  if (typeof boundary !== 'string' || !boundary) {
    throw new DecodeError('EmptyBoundary');
  }
  const bytes = Buffer.from(boundary, 'utf-8');
  if (bytes.byteLength > MAX_BOUNDARY_BYTES) {
    throw new DecodeError('BoundaryTooLong');
  }
  return Buffer.concat([BUF_CRLF_DASHES, bytes]);
}

/**
 * Reads the `boundary` parameter from a `multipart/*` Content-Type header value.
 *
 * Returns `undefined` if the header is not multipart, is malformed, or has no boundary.
 */
export function getBoundary(contentType: string | undefined): string | undefined {
  const parsed = parseContentType(contentType);
  if (!parsed?.mime.startsWith('multipart/')) {
    return undefined;
  }
  return parsed.params.get('boundary');
}

const BUF_CRLF_DASHES = /*@__PURE__*/ Buffer.from('\r\n--', 'latin1');
