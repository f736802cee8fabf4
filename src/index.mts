export {
  HeaderError,
  DecodeError,
  type HeaderErrorCode,
  type DecodeErrorCode,
} from './core/errors.mts';
export { logLevels, makeLogger, type LogLevel, type Logger } from './core/log.mts';
export { getBoundary, MAX_BOUNDARY_BYTES } from './core/boundary.mts';

export { findBoundary, type BoundaryScan } from './scanner/findBoundary.mts';

export { PartHeaders } from './headers/PartHeaders.mts';
export { parseHeaders, readPartInfo, type PartInfo } from './headers/parseHeaders.mts';
export {
  parseContentDisposition,
  type ContentDisposition,
  type ParamDecoder,
} from './headers/contentDisposition.mts';
export { parseContentType, type ContentType } from './headers/contentType.mts';

export type {
  DecodeEvent,
  PartStartedEvent,
  BodyChunkEvent,
  PartEndedEvent,
} from './decoder/events.mts';
export {
  MultipartDecoder,
  type MultipartDecoderOptions,
  type DecoderState,
} from './decoder/MultipartDecoder.mts';
export { decodeMultipart } from './decoder/decodeMultipart.mts';
export { MultipartDecoderStream } from './decoder/MultipartDecoderStream.mts';

export {
  readFormFields,
  type ReadFormFieldsOptions,
  type FormField,
  type FileFormField,
  type StringFormField,
} from './form/readFormFields.mts';

export { encode, getEncodedLength } from './encoder/encode.mts';
export { encodeAsync } from './encoder/encodeAsync.mts';
export type {
  PartDescriptor,
  PartHeadersInit,
  BodySource,
  AsyncBodySource,
  BodyChunk,
} from './encoder/partHead.mts';
