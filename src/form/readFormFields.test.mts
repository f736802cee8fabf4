import { Readable } from 'node:stream';
import { byteChunks, lines } from '../test-helpers/chunks.mts';
import { readFormFields, type FormField } from './readFormFields.mts';
import 'lean-test';

const SOURCE = Buffer.concat([
  lines(
    '--X',
    'Content-Disposition: form-data; name="title"',
    '',
    'Holiday',
    '--X',
    'Content-Disposition: form-data; name="photo"; filename="beach.jpg"',
    'Content-Type: image/jpeg',
    '',
    'JPEG',
    '--X',
    'Content-Disposition: form-data; name="raw"; filename="data"',
    '',
    'bytes',
    '--X',
    'Content-Disposition: form-data; name="note"',
    'Content-Type: text/markdown; charset=latin1',
    '',
    '',
  ),
  Buffer.from([0xe9]),
  lines('', '--X--'),
]);

describe('readFormFields', () => {
  it('reads all fields', async () => {
    const fields = await readFormFields([SOURCE], 'X');
    expect(simplify(fields)).equals([
      { type: 'string', name: 'title', mimeType: 'text/plain', value: 'Holiday' },
      { type: 'file', name: 'photo', filename: 'beach.jpg', mimeType: 'image/jpeg', value: 'JPEG' },
      {
        type: 'file',
        name: 'raw',
        filename: 'data',
        mimeType: 'application/octet-stream',
        value: 'bytes',
      },
      { type: 'string', name: 'note', mimeType: 'text/markdown', value: 'é' },
    ]);
  });

  it('includes the part headers', async () => {
    const [, photo] = await readFormFields([SOURCE], 'X');
    expect(photo?.headers.get('content-type')).equals('image/jpeg');
  });

  it('reads from a stream', async () => {
    const fields = await readFormFields(Readable.from(byteChunks(SOURCE)), 'X');
    expect(fields.map((field) => field.name)).equals(['title', 'photo', 'raw', 'note']);
  });

  it('decodes text using the default charset', async () => {
    const source = Buffer.concat([
      lines('--X', 'Content-Disposition: form-data; name="a"', '', ''),
      Buffer.from([0xe9]),
      lines('', '--X--'),
    ]);
    const [utf8] = await readFormFields([source], 'X');
    expect(utf8?.value).equals('�');
    const [latin1] = await readFormFields([source], 'X', { defCharset: 'latin1' });
    expect(latin1?.value).equals('é');
  });

  it('rejects unknown charsets', async () => {
    const source = lines(
      '--X',
      'Content-Disposition: form-data; name="a"',
      'Content-Type: text/plain; charset=nope',
      '',
      'v',
      '--X--',
    );
    await expect(() => readFormFields([source], 'X')).throws('unsupported charset: nope');
    await expect(() => readFormFields([SOURCE], 'X', { defCharset: 'nope' })).throws();
  });

  it('limits the size of fields', async () => {
    await expect(() => readFormFields([SOURCE], 'X', { maxFieldSize: 6 })).throws(
      'value for "title" too large',
    );
    const fields = await readFormFields([SOURCE], 'X', { maxFieldSize: 7 });
    expect(fields).hasLength(4);
  });

  it('limits the size of files', async () => {
    await expect(() => readFormFields(byteChunks(SOURCE), 'X', { maxFileSize: 4 })).throws(
      'uploaded file for "raw" too large',
    );
    await expect(() => readFormFields([SOURCE], 'X', { maxFileSize: -1 })).throws(
      'maxFileSize must be a non-negative integer - got -1',
    );
  });

  it('passes decoder options through', async () => {
    await expect(() => readFormFields([SOURCE], 'X', { maxHeaderBytes: 10 })).throws(
      'part headers too large',
    );
  });
});

function simplify(fields: FormField[]) {
  return fields.map((field) =>
    field.type === 'file'
      ? {
          type: field.type,
          name: field.name,
          filename: field.filename,
          mimeType: field.mimeType,
          value: field.value.toString('latin1'),
        }
      : { type: field.type, name: field.name, mimeType: field.mimeType, value: field.value },
  );
}
