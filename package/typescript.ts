import { Readable } from 'node:stream';
import { ReadableStream } from 'node:stream/web';
import {
  MultipartDecoder,
  MultipartDecoderStream,
  PartHeaders,
  decodeMultipart,
  encode,
  encodeAsync,
  getBoundary,
  getEncodedLength,
  makeLogger,
  readFormFields,
  type DecodeEvent,
  type DecoderState,
  type FormField,
  type PartDescriptor,
  type PartEndedEvent,
} from 'multipart-codec';

// this file just checks types; the code is not executed

function decodeChunk(chunk: Uint8Array) {
  const decoder = new MultipartDecoder('boundary', {
    maxHeaderBytes: 1024,
    log: makeLogger('warn'),
  });
  assertType(decoder.state)<DecoderState>();

  for (const event of decoder.feed(chunk)) {
    if (event.type === 'partStarted') {
      assertType(event.name)<string>();
      assertType(event.filename)<string | undefined>();
      assertType(event.headers)<PartHeaders>();
      assertType(event.headers.get('content-type'))<string | undefined>();
    } else if (event.type === 'bodyChunk') {
      assertType(event.data)<Buffer>();
    } else {
      assertType(event)<PartEndedEvent>();
    }
  }
  assertType(decoder.finish())<void>();
}

async function decodeRequest(req: Readable, contentType: string | undefined) {
  const boundary = getBoundary(contentType);
  assertType(boundary)<string | undefined>();
  if (!boundary) {
    return;
  }
  for await (const event of decodeMultipart(req, boundary)) {
    assertType(event)<DecodeEvent>();
  }

  const fields = await readFormFields(req, boundary, { maxFileSize: 1024 });
  for (const field of fields) {
    assertType(field)<FormField>();
    if (field.type === 'file') {
      assertType(field.value)<Buffer>();
      assertType(field.filename)<string>();
    } else {
      assertType(field.value)<string>();
    }
  }
}

function pipeRequest(body: ReadableStream<Uint8Array>) {
  const events = body.pipeThrough(new MultipartDecoderStream('boundary'));
  assertType(events)<ReadableStream<DecodeEvent>>();
}

function encodeParts() {
  const parts: PartDescriptor[] = [
    { name: 'a', body: 'text' },
    { name: 'b', filename: 'b.txt', body: Buffer.from('data') },
    { name: 'c', headers: { 'X-Custom': '1' }, body: ['chunk', new Uint8Array(2)] },
    { name: 'd', headers: new PartHeaders([['X-Custom', '1']]), body: '' },
  ];
  assertType(getEncodedLength('boundary', parts))<number | undefined>();
  assertType(encode('boundary', parts))<Generator<Buffer, void, undefined>>();
  return Readable.from(
    encodeAsync('boundary', [{ name: 'upload', body: Readable.from(['async', 'chunks']) }]),
  );
}

// @ts-expect-error
encode('boundary', [{ name: 'a', body: 1 }]);

// assertion helper
type Equals<A, B> =
  (<G>() => G extends A ? 1 : 2) extends <G>() => G extends B ? 1 : 2 ? [] : ['nope'];
const assertType =
  <Actual>(_: Actual) =>
  <Expected>(..._typesDoNotMatch: Equals<Actual, Expected>) => {};
