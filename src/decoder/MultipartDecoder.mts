import { internalBoundaryMarker } from '../core/boundary.mts';
import { DecodeError } from '../core/errors.mts';
import { NO_LOG, type Logger } from '../core/log.mts';
import type { ParamDecoder } from '../headers/contentDisposition.mts';
import { parseHeaders, readPartInfo } from '../headers/parseHeaders.mts';
import { findBoundary } from '../scanner/findBoundary.mts';
import { guardLimit } from '../util/guardLimit.mts';
import type { DecodeEvent } from './events.mts';

// https://datatracker.ietf.org/doc/html/rfc7578

const STATE_PRE_BOUNDARY = 0;
const STATE_IN_HEADERS = 1;
const STATE_IN_BODY = 2;
const STATE_EPILOGUE = 3;
const STATE_DONE = 4;
const STATE_FAILED = 5;

const STATE_NAMES = [
  'preBoundary',
  'inHeaders',
  'inBody',
  'epilogue',
  'done',
  'failed',
] as const;

export type DecoderState = (typeof STATE_NAMES)[number];

export interface MultipartDecoderOptions {
  /**
   * The maximum size (in bytes) of the header block of a single part.
   * @default 16384
   */
  maxHeaderBytes?: number | undefined;

  /**
   * The maximum total number of bytes which can be fed to the decoder (including boundaries,
   * headers, preamble and epilogue).
   * @default Infinity
   */
  maxInputBytes?: number | undefined;

  /**
   * Character set used for plain (non-extended) Content-Disposition parameters, such as `name`
   * and `filename`. According to the standard this should be `latin1`, but browsers use `utf-8`.
   * @default 'utf-8'
   */
  paramCharset?: string | undefined;

  /**
   * Receives diagnostic messages (level 1: warnings, level 2: debug).
   * @default no logging
   */
  log?: Logger | undefined;
}

/**
 * Incremental decoder for a `multipart/form-data` body.
 *
 * Chunks of the body are given to `feed` in order, which returns the events which could be
 * decoded so far. Once the whole body has been given, `finish` must be called to check that it
 * was complete.
 *
 * Only a bounded amount of data is retained between calls: part content is returned as soon as
 * it is known not to contain a boundary. Retained data is always copied, so the caller may reuse
 * its chunk buffers once `feed` returns (body chunk events may still refer to them).
 *
 * Any error puts the decoder into a failed state, after which every call throws the same error.
 */
export class MultipartDecoder {
  /** @internal */ declare private readonly _marker: Buffer;
  /** @internal */ declare private readonly _maxHeaderBytes: number;
  /** @internal */ declare private readonly _paramDecoder: ParamDecoder;
  /** @internal */ declare private readonly _log: Logger;
  /** @internal */ declare private _inputRemaining: number;
  /** @internal */ declare private _state: number;
  /** @internal */ declare private _retained: Buffer[];
  /** @internal */ declare private _retainedBytes: number;
  /** @internal */ declare private _discarded: number;
  /** @internal */ declare private _error: unknown;

  constructor(
    boundary: string,
    {
      maxHeaderBytes = MAX_HEADER_SIZE,
      maxInputBytes = Number.POSITIVE_INFINITY,
      paramCharset = 'utf-8',
      log = NO_LOG,
    }: MultipartDecoderOptions = {},
  ) {
    guardLimit(maxHeaderBytes, 'maxHeaderBytes');
    guardLimit(maxInputBytes, 'maxInputBytes');
    this._marker = internalBoundaryMarker(boundary);
    this._maxHeaderBytes = maxHeaderBytes;
    this._paramDecoder = new TextDecoder(paramCharset);
    this._log = log;
    this._inputRemaining = maxInputBytes;
    this._state = STATE_PRE_BOUNDARY;
    // the first boundary does not need a preceding line break, so pretend there was one
    this._retained = [BUF_CRLF];
    this._retainedBytes = BUF_CRLF.byteLength;
    this._discarded = -BUF_CRLF.byteLength;
    this._error = undefined;
  }

  get state(): DecoderState {
    return STATE_NAMES[this._state]!;
  }

  /**
   * Decodes the next chunk of the body.
   *
   * @returns the events which are now available (possibly none).
   * @throws {DecodeError | HeaderError} if the content is invalid, or the decoder has finished.
   */
  feed(chunk: Uint8Array): DecodeEvent[] {
    if (this._state === STATE_FAILED) {
      throw this._error;
    }
    if (this._state === STATE_DONE) {
      throw new DecodeError('StateViolation');
    }
    const len = chunk.byteLength;
    if (!len) {
      return [];
    }
    if ((this._inputRemaining -= len) < 0) {
      return this._fail(new DecodeError('TooLarge'));
    }
    if (this._state === STATE_EPILOGUE) {
      this._discarded += len;
      return [];
    }

    const data = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk.buffer, chunk.byteOffset, len);
    const events: DecodeEvent[] = [];
    try {
      if (this._state === STATE_IN_HEADERS && !this._completesHeaders(data)) {
        // the retained block starts with the line break of the boundary line
        if (this._retainedBytes + len - 5 > this._maxHeaderBytes) {
          throw new DecodeError('TooLarge', { message: 'part headers too large' });
        }
        this._retain(Buffer.from(data));
        return events;
      }
      const retained = this._retained;
      this._release();
      this._process(
        retained.length ? Buffer.concat([...retained, data]) : data,
        events,
      );
    } catch (error: unknown) {
      return this._fail(error);
    }
    return events;
  }

  /**
   * Marks the end of the body.
   *
   * @throws {DecodeError} if the terminal boundary has not been seen.
   */
  finish() {
    switch (this._state) {
      case STATE_FAILED:
        throw this._error;
      case STATE_EPILOGUE:
        if (this._discarded > 0) {
          this._log(2, `discarded ${this._discarded} bytes of epilogue`);
        }
        this._state = STATE_DONE;
        return;
      case STATE_DONE:
        return;
      default:
        this._fail(new DecodeError('UnexpectedEof'));
    }
  }

  /** @internal */
  private _process(buf: Buffer, events: DecodeEvent[]) {
    // in the header state, the retained buffer begins with the line break of the boundary line
    let pos = this._state === STATE_IN_HEADERS ? 2 : 0;
    while (true) {
      if (this._state === STATE_IN_HEADERS) {
        const end = buf.indexOf(BUF_CRLFCRLF, pos - 2);
        if (end === -1) {
          if (buf.byteLength - pos - 3 > this._maxHeaderBytes) {
            throw new DecodeError('TooLarge', { message: 'part headers too large' });
          }
          this._retain(Buffer.from(buf.subarray(pos - 2)));
          return;
        }
        if (end - pos > this._maxHeaderBytes) {
          throw new DecodeError('TooLarge', { message: 'part headers too large' });
        }
        const headers = parseHeaders(end > pos ? buf.subarray(pos, end) : EMPTY);
        const { name, filename } = readPartInfo(headers, this._paramDecoder, this._log);
        events.push({ type: 'partStarted', headers, name, filename });
        this._state = STATE_IN_BODY;
        pos = end + 4;
        continue;
      }

      // preamble or body content
      const inBody = this._state === STATE_IN_BODY;
      const scan = findBoundary(buf, this._marker, pos);
      const contentEnd = scan.type === 'none' ? buf.byteLength : scan.start;
      if (contentEnd > pos) {
        if (inBody) {
          events.push({ type: 'bodyChunk', data: buf.subarray(pos, contentEnd) });
        } else {
          this._discarded += contentEnd - pos;
        }
      }
      if (scan.type !== 'match') {
        if (scan.type === 'partial') {
          this._retain(Buffer.from(buf.subarray(scan.start)));
        }
        return;
      }

      if (inBody) {
        events.push({ type: 'partEnded' });
      } else {
        if (this._discarded > 0) {
          this._log(2, `discarded ${this._discarded} bytes of preamble`);
        }
        this._discarded = 0;
      }
      if (scan.isFinal) {
        this._state = STATE_EPILOGUE;
        this._discarded = buf.byteLength - scan.end;
        return;
      }
      this._state = STATE_IN_HEADERS;
      pos = scan.end;
    }
  }

  /**
   * Checks whether `data` contains the end of the header block, including a terminator which
   * begins in the retained bytes.
   *
   * @internal
   */
  private _completesHeaders(data: Buffer) {
    if (data.indexOf(BUF_CRLFCRLF) !== -1) {
      return true;
    }
    const tail: Buffer[] = [];
    let need = BUF_CRLFCRLF.byteLength - 1;
    for (let i = this._retained.length - 1; i >= 0 && need > 0; --i) {
      const part = this._retained[i]!;
      const piece = part.subarray(Math.max(0, part.byteLength - need));
      tail.unshift(piece);
      need -= piece.byteLength;
    }
    tail.push(data.subarray(0, BUF_CRLFCRLF.byteLength - 1));
    return Buffer.concat(tail).indexOf(BUF_CRLFCRLF) !== -1;
  }

  /** @internal */
  private _retain(data: Buffer) {
    this._retained.push(data);
    this._retainedBytes += data.byteLength;
  }

  /** @internal */
  private _release() {
    this._retained = [];
    this._retainedBytes = 0;
  }

  /** @internal */
  private _fail(error: unknown): never {
    this._state = STATE_FAILED;
    this._error = error;
    this._release();
    throw error;
  }
}

const MAX_HEADER_SIZE = 16 * 1024; // From node (its default value)

const EMPTY = /*@__PURE__*/ Buffer.alloc(0);
const BUF_CRLF = /*@__PURE__*/ Buffer.from('\r\n', 'latin1');
const BUF_CRLFCRLF = /*@__PURE__*/ Buffer.from('\r\n\r\n', 'latin1');
