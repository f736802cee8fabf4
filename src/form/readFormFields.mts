import { DecodeError, HeaderError } from '../core/errors.mts';
import { decodeMultipart } from '../decoder/decodeMultipart.mts';
import type { PartStartedEvent } from '../decoder/events.mts';
import type { MultipartDecoderOptions } from '../decoder/MultipartDecoder.mts';
import { parseContentType } from '../headers/contentType.mts';
import type { PartHeaders } from '../headers/PartHeaders.mts';
import { guardLimit } from '../util/guardLimit.mts';

export interface ReadFormFieldsOptions extends MultipartDecoderOptions {
  /**
   * Character set used to decode text fields which do not specify a charset in their Content-Type.
   * @default 'utf-8'
   */
  defCharset?: string | undefined;

  /**
   * The maximum size (in bytes) of a single text field.
   * @default 1048576 (1MB)
   */
  maxFieldSize?: number | undefined;

  /**
   * The maximum size (in bytes) of a single file.
   * @default Infinity
   */
  maxFileSize?: number | undefined;
}

interface CommonFormField {
  name: string;
  mimeType: string;
  headers: PartHeaders;
}

export interface FileFormField extends CommonFormField {
  type: 'file';
  filename: string;
  value: Buffer;
}

export interface StringFormField extends CommonFormField {
  type: 'string';
  value: string;
}

export type FormField = StringFormField | FileFormField;

/**
 * Reads an entire `multipart/form-data` body into memory.
 *
 * Parts with a filename become `file` fields holding the raw bytes; all others become `string`
 * fields, decoded using the charset from their Content-Type (or `defCharset`).
 */
export async function readFormFields(
  source: AsyncIterable<Uint8Array> | Iterable<Uint8Array>,
  boundary: string,
  {
    defCharset = 'utf-8',
    maxFieldSize = 1 * 1024 * 1024,
    maxFileSize = Number.POSITIVE_INFINITY,
    ...options
  }: ReadFormFieldsOptions = {},
): Promise<FormField[]> {
  guardLimit(maxFieldSize, 'maxFieldSize');
  guardLimit(maxFileSize, 'maxFileSize');
  const defaultDecoder = new TextDecoder(defCharset);

  const fields: FormField[] = [];
  let current: PartStartedEvent | undefined;
  let content: Buffer[] = [];
  let size = 0;
  let limit = 0;

  for await (const event of decodeMultipart(source, boundary, options)) {
    switch (event.type) {
      case 'partStarted':
        current = event;
        content = [];
        size = 0;
        limit = event.filename === undefined ? maxFieldSize : maxFileSize;
        break;
      case 'bodyChunk':
        size += event.data.byteLength;
        if (size > limit) {
          const what = current?.filename === undefined ? 'value' : 'uploaded file';
          throw new DecodeError('TooLarge', {
            message: `${what} for ${JSON.stringify(current?.name)} too large`,
          });
        }
        content.push(event.data);
        break;
      case 'partEnded':
        if (current) {
          fields.push(makeField(current, Buffer.concat(content, size), defaultDecoder));
        }
        current = undefined;
        content = [];
        break;
    }
  }
  return fields;
}

function makeField(
  { name, filename, headers }: PartStartedEvent,
  value: Buffer,
  defaultDecoder: TextDecoder,
): FormField {
  const contentType = parseContentType(headers.get('content-type'));
  if (filename !== undefined) {
    return {
      type: 'file',
      name,
      filename,
      value,
      mimeType: contentType?.mime ?? 'application/octet-stream',
      headers,
    };
  }
  const charset = contentType?.params.get('charset');
  let decoder = defaultDecoder;
  if (charset !== undefined) {
    try {
      decoder = new TextDecoder(charset);
    } catch (error: unknown) {
      throw new HeaderError('Malformed', { message: `unsupported charset: ${charset}`, cause: error });
    }
  }
  return {
    type: 'string',
    name,
    value: decoder.decode(value),
    mimeType: contentType?.mime ?? 'text/plain',
    headers,
  };
}
