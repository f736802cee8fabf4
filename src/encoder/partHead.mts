import { isToken } from '../headers/contentDisposition.mts';

export type BodyChunk = Uint8Array | string;
export type BodySource = BodyChunk | Iterable<BodyChunk>;
export type AsyncBodySource = BodySource | AsyncIterable<BodyChunk>;

export type PartHeadersInit =
  | Iterable<readonly [string, string]>
  | Readonly<Record<string, string>>;

export interface PartDescriptor<Body = BodySource> {
  name: string;
  filename?: string | undefined;
  /** written as the Content-Type header; replaces any `content-type` in `headers` */
  contentType?: string | undefined;
  /** additional headers, written in order (any `content-disposition` is ignored) */
  headers?: PartHeadersInit | undefined;
  /** strings are written as UTF-8; iterables are read once */
  body: Body;
}

/**
 * Serialises everything which precedes the body of a part: the boundary line, the headers, and
 * the blank line.
 *
 * Field names and filenames are written as UTF-8 quoted strings. Other header values are written
 * as latin1 (matching how they are read by the decoder).
 */
export function internalEncodePartHead(
  marker: Buffer,
  { name, filename, contentType, headers }: PartDescriptor<unknown>,
): Buffer {
  let disposition = `Content-Disposition: form-data; name="${quoteParam(name, 'name')}"`;
  if (filename !== undefined) {
    disposition += `; filename="${quoteParam(filename, 'filename')}"`;
  }
  let lines = '\r\n';
  if (contentType !== undefined) {
    lines += headerLine('Content-Type', contentType);
  }
  for (const [headerName, value] of headerEntries(headers)) {
    const lower = headerName.toLowerCase();
    if (lower === 'content-disposition' || (lower === 'content-type' && contentType !== undefined)) {
      continue;
    }
    lines += headerLine(headerName, value);
  }
  return Buffer.concat([
    marker,
    BUF_CRLF,
    Buffer.from(disposition, 'utf-8'),
    Buffer.from(lines + '\r\n', 'latin1'),
  ]);
}

export function internalTerminalBoundary(marker: Buffer): Buffer {
  return Buffer.concat([marker, BUF_TERMINAL_SUFFIX]);
}

export function internalToBuffer(chunk: BodyChunk): Buffer {
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf-8');
  }
  return Buffer.isBuffer(chunk)
    ? chunk
    : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
}

function headerEntries(headers: PartHeadersInit | undefined): Iterable<readonly [string, string]> {
  if (!headers) {
    return [];
  }
  if (isIterable(headers)) {
    return headers;
  }
  return Object.entries(headers);
}

const isIterable = (headers: PartHeadersInit): headers is Iterable<readonly [string, string]> =>
  Symbol.iterator in headers;

function quoteParam(value: string, what: string) {
  if (typeof value !== 'string' || INVALID_PARAM_CHARS.test(value)) {
    throw new TypeError(`invalid ${what}: ${JSON.stringify(value)}`);
  }
  return value.replaceAll(/["\\]/g, '\\$&');
}

function headerLine(name: string, value: string) {
  if (!isToken(name)) {
    throw new TypeError(`invalid header name: ${JSON.stringify(name)}`);
  }
  if (INVALID_VALUE_CHARS.test(value)) {
    throw new TypeError(`invalid value for header ${name}: ${JSON.stringify(value)}`);
  }
  return `${name}: ${value}\r\n`;
}

const INVALID_PARAM_CHARS = /[\x00-\x08\x0a-\x1f\x7f]/;
const INVALID_VALUE_CHARS = /[\x00-\x08\x0a-\x1f\x7f]|[^\x00-\xff]/;

const BUF_CRLF = /*@__PURE__*/ Buffer.from('\r\n', 'latin1');
const BUF_TERMINAL_SUFFIX = /*@__PURE__*/ Buffer.from('--\r\n', 'latin1');
