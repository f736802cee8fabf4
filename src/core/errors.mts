interface MultipartErrorOptions {
  message?: string | undefined;
  cause?: unknown;
}

export type HeaderErrorCode = 'Malformed' | 'MissingFieldName';

export class HeaderError extends Error {
  declare public readonly code: HeaderErrorCode;

  constructor(code: HeaderErrorCode, { message, ...options }: MultipartErrorOptions = {}) {
    super(message ?? DEFAULT_HEADER_MESSAGES[code], options);
    this.code = code;
    this.name = `HeaderError(${code})`;
  }
}

export type DecodeErrorCode =
  | 'UnexpectedEof'
  | 'BoundaryTooLong'
  | 'EmptyBoundary'
  | 'StateViolation'
  | 'TooLarge'
  | 'MalformedBoundary';

export class DecodeError extends Error {
  declare public readonly code: DecodeErrorCode;

  constructor(code: DecodeErrorCode, { message, ...options }: MultipartErrorOptions = {}) {
    super(message ?? DEFAULT_DECODE_MESSAGES[code], options);
    this.code = code;
    this.name = `DecodeError(${code})`;
  }
}

const DEFAULT_HEADER_MESSAGES: Record<HeaderErrorCode, string> = {
  Malformed: 'malformed part header',
  MissingFieldName: 'missing field name',
};

const DEFAULT_DECODE_MESSAGES: Record<DecodeErrorCode, string> = {
  UnexpectedEof: 'unexpected end of form',
  BoundaryTooLong: 'multipart boundary too long',
  EmptyBoundary: 'multipart boundary not found',
  StateViolation: 'decoder is already complete',
  TooLarge: 'content too large',
  MalformedBoundary: 'malformed boundary line',
};
