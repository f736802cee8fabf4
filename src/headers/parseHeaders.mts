import { HeaderError } from '../core/errors.mts';
import type { Logger } from '../core/log.mts';
import { isToken, parseContentDisposition, type ParamDecoder } from './contentDisposition.mts';
import { PartHeaders } from './PartHeaders.mts';

/**
 * Parses the header block of a part: the bytes between the boundary line and the blank line
 * (excluding both).
 *
 * Lines beginning with a space or tab continue the previous header (obsolete line folding),
 * and are joined to it with a single space.
 */
export function parseHeaders(block: Uint8Array): PartHeaders {
  const headers = new PartHeaders();
  if (!block.byteLength) {
    return headers;
  }
  const text = Buffer.from(block.buffer, block.byteOffset, block.byteLength).toString('latin1');

  let name: string | undefined;
  let value = '';
  for (const line of text.split('\r\n')) {
    if (!line) {
      continue;
    }
    if (INVALID_VALUE_CHARS.test(line)) {
      throw new HeaderError('Malformed', { message: 'invalid character in part header' });
    }
    const first = line.charCodeAt(0);
    if (first === 32 /* ' ' */ || first === 9 /* '\t' */) {
      if (name === undefined) {
        throw new HeaderError('Malformed', { message: 'unexpected continuation line' });
      }
      const continuation = trimOWS(line);
      if (continuation) {
        value = value ? `${value} ${continuation}` : continuation;
      }
      continue;
    }
    if (name !== undefined) {
      headers.append(name, value);
    }
    const sep = line.indexOf(':');
    if (sep === -1) {
      throw new HeaderError('Malformed', { message: 'malformed part header' });
    }
    name = line.substring(0, sep);
    if (!isToken(name)) {
      throw new HeaderError('Malformed', { message: 'malformed part header name' });
    }
    value = trimOWS(line.substring(sep + 1));
  }
  if (name !== undefined) {
    headers.append(name, value);
  }
  return headers;
}

export interface PartInfo {
  name: string;
  filename: string | undefined;
}

/**
 * Reads the field name and filename from the Content-Disposition header.
 *
 * If both `filename*` and `filename` are given, `filename*` wins.
 */
export function readPartInfo(
  headers: PartHeaders,
  paramDecoder: ParamDecoder,
  log: Logger,
): PartInfo {
  const disposition = headers.get('content-disposition');
  if (disposition === undefined) {
    throw new HeaderError('MissingFieldName', { message: 'missing content-disposition' });
  }
  const { type, params } = parseContentDisposition(disposition, paramDecoder);
  if (type !== 'form-data') {
    log(1, `unexpected content-disposition type ${JSON.stringify(type)}`);
  }
  const name = params.get('name');
  if (name === undefined) {
    throw new HeaderError('MissingFieldName');
  }
  return { name, filename: params.get('filename*') ?? params.get('filename') };
}

const trimOWS = (value: string) => value.replace(/^[ \t]+|[ \t]+$/g, '');

// control characters other than tab
const INVALID_VALUE_CHARS = /[\x00-\x08\x0a-\x1f\x7f]/;
