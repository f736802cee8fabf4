import { HeaderError } from '../core/errors.mts';

// https://datatracker.ietf.org/doc/html/rfc6266
// https://datatracker.ietf.org/doc/html/rfc5987 (extended parameters: filename*=UTF-8''...)
// https://datatracker.ietf.org/doc/html/rfc2231#section-3 (continuations: filename*0=...)

export type ParamDecoder = Pick<TextDecoder, 'decode'>;

export interface ContentDisposition {
  type: string;
  params: Map<string, string>;
}

/**
 * Parses a Content-Disposition header value (as read from the wire in latin1) into its
 * disposition type and parameters.
 *
 * Parameter names are lower-cased. Only the first occurrence of each parameter is kept.
 * Plain parameter values are decoded with `paramDecoder`; extended values use the charset
 * they declare. RFC 2231 continuations (`filename*0`, `filename*1`, ...) are joined in order,
 * and stored as `filename*` if the first segment is extended, or `filename` otherwise.
 *
 * @throws {HeaderError} if the value does not follow the parameter grammar.
 */
export function parseContentDisposition(
  value: string,
  paramDecoder: ParamDecoder,
): ContentDisposition {
  const buffer = Buffer.from(value, 'latin1');
  const params = new Map<string, string>();
  let i = 0;
  for (; i < buffer.byteLength; ++i) {
    if (!TOKEN[buffer[i]!]) {
      break;
    }
  }
  if (!i) {
    throw malformed();
  }
  const type = buffer.toString('latin1', 0, i).toLowerCase();
  readParams(buffer, i, params, paramDecoder);
  return { type, params };
}

interface Segment {
  _charset: string | undefined;
  _bytes: Uint8Array;
}

function readParams(
  buffer: Buffer,
  i: number,
  params: Map<string, string>,
  paramDecoder: ParamDecoder,
) {
  const L = buffer.byteLength;
  // RFC 2231 continuations (name*0, name*1*, ...) are joined once all parameters are read
  const continuations = new Map<string, Map<number, Segment>>();
  while (i < L) {
    i = skipWhitespace(buffer, i);
    if (i === L) {
      break;
    }

    if (buffer[i++] !== 59 /* ';' */) {
      throw malformed();
    }

    i = skipWhitespace(buffer, i);
    if (i === L) {
      // tolerate a trailing ';'
      break;
    }

    const nameStart = i;
    for (; i < L; ++i) {
      const code = buffer[i]!;
      if (!TOKEN[code]) {
        if (code === 61 /* '=' */) {
          break;
        }
        throw malformed();
      }
    }
    if (i === L || i === nameStart) {
      throw malformed();
    }

    const name = buffer.toString('latin1', nameStart, i).toLowerCase();
    ++i; // '='
    if (i === L) {
      throw malformed();
    }

    const continuation = CONTINUATION.exec(name);
    const extended = name.endsWith('*');
    let charset: string | undefined;
    let bytes: Uint8Array;
    if (extended) {
      const withCharset = !continuation || continuation[2] === '0';
      [charset, bytes, i] = readExtendedValue(buffer, i, withCharset);
    } else if (buffer[i] === 34 /* '"' */) {
      // a filename beginning \\ is a UNC path sent without escaping
      const literal =
        name === 'filename' && buffer[i + 1] === 92 /* '\\' */ && buffer[i + 2] === 92;
      [bytes, i] = readQuotedValue(buffer, i + 1, literal);
    } else {
      const valueStart = i;
      for (; i < L && TOKEN[buffer[i]!]; ++i);
      if (i === valueStart) {
        throw malformed();
      }
      bytes = buffer.subarray(valueStart, i);
    }

    if (continuation) {
      const baseName = continuation[1]!;
      let segments = continuations.get(baseName);
      if (!segments) {
        segments = new Map();
        continuations.set(baseName, segments);
      }
      const index = Number.parseInt(continuation[2]!, 10);
      if (!segments.has(index)) {
        segments.set(index, { _charset: charset, _bytes: bytes });
      }
    } else if (!params.has(name)) {
      params.set(name, charset === undefined ? paramDecoder.decode(bytes) : decode(charset, bytes));
    }
  }

  for (const [baseName, segments] of continuations) {
    const first = segments.get(0);
    if (!first) {
      continue;
    }
    const parts: Uint8Array[] = [];
    for (let index = 0; ; ++index) {
      const segment = segments.get(index);
      if (!segment) {
        break;
      }
      parts.push(segment._bytes);
    }
    const bytes = Buffer.concat(parts);
    const charset = first._charset;
    const name = charset === undefined ? baseName : `${baseName}*`;
    if (!params.has(name)) {
      params.set(name, charset === undefined ? paramDecoder.decode(bytes) : decode(charset, bytes));
    }
  }
}

function readQuotedValue(buffer: Buffer, i: number, literal: boolean): [Uint8Array, number] {
  const L = buffer.byteLength;
  const bytes: number[] = [];
  for (; i < L; ++i) {
    const code = buffer[i]!;
    if (code === 92 /* '\\' */ && !literal) {
      ++i;
      if (i === L) {
        break;
      }
      bytes.push(buffer[i]!);
      continue;
    }
    if (code === 34 /* '"' */) {
      return [Uint8Array.from(bytes), i + 1];
    }
    if (!QDTEXT[code] && !(literal && code === 92)) {
      throw malformed();
    }
    bytes.push(code);
  }
  // no end quote
  throw malformed();
}

function readExtendedValue(
  buffer: Buffer,
  i: number,
  withCharset: boolean,
): [string | undefined, Uint8Array, number] {
  const L = buffer.byteLength;
  let charset: string | undefined;
  if (withCharset) {
    const charsetStart = i;
    for (; i < L && CHARSET[buffer[i]!]; ++i);
    if (i === L || buffer[i] !== 39 /* '\'' */) {
      throw malformed();
    }
    charset = buffer.toString('latin1', charsetStart, i);
    ++i;

    // language tag is ignored
    for (; i < L && buffer[i] !== 39 /* '\'' */; ++i);
    if (i === L) {
      throw malformed();
    }
    ++i;
  }

  const bytes: number[] = [];
  for (; i < L; ++i) {
    const code = buffer[i]!;
    if (code === 37 /* '%' */) {
      const hexUpper = i + 2 < L ? HEX_VALUES[buffer[i + 1]!]! : 16;
      const hexLower = i + 2 < L ? HEX_VALUES[buffer[i + 2]!]! : 16;
      if (hexUpper === 16 || hexLower === 16) {
        throw malformed();
      }
      bytes.push((hexUpper << 4) | hexLower);
      i += 2;
    } else if (EXTENDED_VALUE[code]) {
      bytes.push(code);
    } else {
      break;
    }
  }
  if (!bytes.length) {
    throw malformed();
  }
  return [charset, Uint8Array.from(bytes), i];
}

function decode(charset: string, bytes: Uint8Array) {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset);
  } catch (error: unknown) {
    throw new HeaderError('Malformed', { message: `unsupported charset: ${charset}`, cause: error });
  }
  return decoder.decode(bytes);
}

function skipWhitespace(buffer: Buffer, i: number) {
  for (; i < buffer.byteLength; ++i) {
    const code = buffer[i];
    if (code !== 32 /* ' ' */ && code !== 9 /* '\t' */) {
      break;
    }
  }
  return i;
}

export function isToken(value: string) {
  if (!value) {
    return false;
  }
  for (let i = 0; i < value.length; ++i) {
    if (!TOKEN[value.charCodeAt(i)]) {
      return false;
    }
  }
  return true;
}

// name*0, name*1*, ...
const CONTINUATION = /^(.+?)\*(0|[1-9][0-9]{0,2})\*?$/;

const malformed = () =>
  new HeaderError('Malformed', { message: 'malformed content-disposition' });

const TOKEN = /*@__PURE__*/ (() => {
  const values = new Uint8Array(256);
  values.set(
    // prettier-ignore
    [
         1, 0, 1, 1, 1, 1, 1, 0, 0, 1, 1, 0, 1, 1, 0,
      1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 0, 0, 0, 0, 0, 0,
      0, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1,
      1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 0, 0, 0, 1, 1,
      1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1,
      1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 0, 1, 0, 1,
    ],
    33,
  );
  return values;
})();

// attr-char (RFC 5987): token characters minus '*', '\'' and '%'
const EXTENDED_VALUE = /*@__PURE__*/ (() => {
  const values = new Uint8Array(TOKEN);
  values[37] = 0;
  values[39] = 0;
  values[42] = 0;
  return values;
})();

const CHARSET = /*@__PURE__*/ (() => {
  const values = new Uint8Array(TOKEN);
  values.set([0, 0, 0, 0, 1, 0, 1, 0], 39);
  values.set([1, 0, 1, 1], 123);
  return values;
})();

const QDTEXT = /*@__PURE__*/ (() => {
  const values = new Uint8Array(256);
  values.fill(1, 32, 256);
  values[0x09] = 1;
  values[0x22] = 0;
  values[0x5c] = 0;
  values[0x7f] = 0;
  return values;
})();

const HEX_VALUES = /*@__PURE__*/ (() => {
  const values = new Uint8Array(256).fill(16);
  for (let i = 0; i < 10; ++i) {
    values[0x30 + i] = i;
  }
  for (let i = 0; i < 6; ++i) {
    values[0x41 + i] = i + 10;
    values[0x61 + i] = i + 10;
  }
  return values;
})();
