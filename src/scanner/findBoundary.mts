import { DecodeError } from '../core/errors.mts';

export type BoundaryScan =
  | { type: 'match'; start: number; end: number; isFinal: boolean }
  | { type: 'partial'; start: number }
  | { type: 'none' };

// https://datatracker.ietf.org/doc/html/rfc2046#section-5.1.1 (transport-padding)
export const MAX_TRANSPORT_PADDING = 256;

/**
 * Finds the first boundary line in `data` at or after `from`.
 *
 * `marker` is `CRLF "--" boundary`. A boundary line is the marker followed by `--` (the terminal
 * boundary), or by optional space / tab padding and CRLF. A marker followed by anything else is
 * not a boundary line and is skipped.
 *
 * If no complete boundary line is found, but one may be forming at the end of `data`, this
 * returns `partial` with the index from which data must be retained. `end` of a `match` points
 * just after the line terminator (or after the `--` of a terminal boundary).
 */
export function findBoundary(data: Buffer, marker: Buffer, from = 0): BoundaryScan {
  const len = data.byteLength;
  const markerLen = marker.byteLength;
  let pos = from;

  while (pos < len) {
    const found = data.indexOf(marker, pos);
    if (found === -1) {
      break;
    }
    const line = readLineEnd(data, found + markerLen);
    if (line === NEED_MORE) {
      return { type: 'partial', start: found };
    }
    if (line !== NOT_BOUNDARY) {
      return { type: 'match', start: found, end: line._end, isFinal: line._final };
    }
    pos = found + 1;
  }

  // Check if the trailing bytes could be the start of a marker
  const firstMarkerChar = marker[0]!;
  for (let i = Math.max(pos, len - markerLen + 1); i < len; ++i) {
    i = data.indexOf(firstMarkerChar, i);
    if (i === -1) {
      break;
    }
    if (!data.compare(marker, 1, len - i, i + 1, len)) {
      return { type: 'partial', start: i };
    }
  }
  return { type: 'none' };
}

interface LineEnd {
  _end: number;
  _final: boolean;
}

const NEED_MORE = 0;
const NOT_BOUNDARY = 1;

function readLineEnd(data: Buffer, p: number): LineEnd | typeof NEED_MORE | typeof NOT_BOUNDARY {
  const len = data.byteLength;
  if (p >= len) {
    return NEED_MORE;
  }
  if (data[p] === 45 /* '-' */) {
    if (p + 1 === len) {
      return NEED_MORE;
    }
    return data[p + 1] === 45 ? { _end: p + 2, _final: true } : NOT_BOUNDARY;
  }
  let i = p;
  for (; i < len; ++i) {
    const code = data[i];
    if (code !== 32 /* ' ' */ && code !== 9 /* '\t' */) {
      break;
    }
  }
  if (i - p > MAX_TRANSPORT_PADDING) {
    throw new DecodeError('MalformedBoundary', { message: 'too much padding after boundary' });
  }
  if (i === len) {
    return NEED_MORE;
  }
  if (data[i] !== 13 /* '\r' */) {
    return NOT_BOUNDARY;
  }
  if (i + 1 === len) {
    return NEED_MORE;
  }
  return data[i + 1] === 10 /* '\n' */ ? { _end: i + 2, _final: false } : NOT_BOUNDARY;
}
