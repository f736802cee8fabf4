import { ReadableStream } from 'node:stream/web';
import { byteChunks, lines } from '../test-helpers/chunks.mts';
import { collect, summarise } from '../test-helpers/events.mts';
import { MultipartDecoderStream } from './MultipartDecoderStream.mts';
import 'lean-test';

describe('MultipartDecoderStream', () => {
  it('transforms chunks into events', async () => {
    const source = lines('--X', 'Content-Disposition: form-data; name="a"', '', 'hello', '--X--');
    const events = await collect(
      ReadableStream.from(byteChunks(source)).pipeThrough(new MultipartDecoderStream('X')),
    );
    expect(summarise(events)).equals([
      { name: 'a', filename: undefined, headers: [['Content-Disposition', 'form-data; name="a"']] },
      'hello',
      null,
    ]);
  });

  it('errors if the content is invalid', async () => {
    const source = lines('--X', 'Content-Disposition form-data', '', '', '--X--');
    const stream = ReadableStream.from([source]).pipeThrough(new MultipartDecoderStream('X'));
    await expect(() => collect(stream)).throws('malformed part header');
  });

  it('errors if the content ends early', async () => {
    const source = lines('--X', 'Content-Disposition: form-data; name="a"', '', 'hello');
    const stream = ReadableStream.from([source]).pipeThrough(new MultipartDecoderStream('X'));
    await expect(() => collect(stream)).throws('unexpected end of form');
  });

  it('validates the boundary immediately', () => {
    expect(() => new MultipartDecoderStream('')).throws('multipart boundary not found');
  });
});
