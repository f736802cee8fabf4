import { TransformStream } from 'node:stream/web';
import type { DecodeEvent } from './events.mts';
import { MultipartDecoder, type MultipartDecoderOptions } from './MultipartDecoder.mts';

export class MultipartDecoderStream extends TransformStream<Uint8Array, DecodeEvent> {
  constructor(boundary: string, options?: MultipartDecoderOptions) {
    const decoder = new MultipartDecoder(boundary, options);
    super({
      transform(chunk, controller) {
        try {
          for (const event of decoder.feed(chunk)) {
            controller.enqueue(event);
          }
        } catch (error: unknown) {
          controller.error(error);
        }
      },
      flush(controller) {
        try {
          decoder.finish();
        } catch (error: unknown) {
          controller.error(error);
        }
      },
    });
  }
}
