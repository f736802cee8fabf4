import { Readable } from 'node:stream';
import { ReadableStream } from 'node:stream/web';
import { collect } from '../test-helpers/events.mts';
import { encode } from './encode.mts';
import { encodeAsync } from './encodeAsync.mts';
import type { AsyncBodySource, PartDescriptor } from './partHead.mts';
import 'lean-test';

describe('encodeAsync', () => {
  it('reads bodies from streams', async () => {
    const encoded = await collect(
      encodeAsync('X', [
        { name: 'a', body: Readable.from(['abc', 'def']) },
        { name: 'b', filename: 'b.bin', body: ReadableStream.from([Buffer.from('ghi')]) },
        { name: 'c', body: 'jkl' },
      ]),
    );
    const expected = [
      ...encode('X', [
        { name: 'a', body: 'abcdef' },
        { name: 'b', filename: 'b.bin', body: 'ghi' },
        { name: 'c', body: 'jkl' },
      ]),
    ];
    expect(Buffer.concat(encoded).toString('latin1')).equals(
      Buffer.concat(expected).toString('latin1'),
    );
    expect(encoded).hasLength(8);
  });

  it('reads parts from an async iterable', async () => {
    async function* parts(): AsyncGenerator<PartDescriptor<AsyncBodySource>> {
      yield { name: 'a', body: '1' };
      yield { name: 'b', body: ['2', '3'] };
    }
    const encoded = await collect(encodeAsync('X', parts()));
    expect(Buffer.concat(encoded).toString('latin1')).equals(
      '\r\n--X\r\nContent-Disposition: form-data; name="a"\r\n\r\n1' +
        '\r\n--X\r\nContent-Disposition: form-data; name="b"\r\n\r\n23' +
        '\r\n--X--\r\n',
    );
  });

  it('rejects invalid boundaries immediately', () => {
    expect(() => encodeAsync('', [])).throws('multipart boundary not found');
  });

  it('propagates errors from bodies', async () => {
    async function* body(): AsyncGenerator<string> {
      yield 'x';
      throw new Error('read failed');
    }
    await expect(() => collect(encodeAsync('X', [{ name: 'a', body: body() }]))).throws(
      'read failed',
    );
  });
});
