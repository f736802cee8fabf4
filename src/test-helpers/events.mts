import type { DecodeEvent } from '../decoder/events.mts';
import type { MultipartDecoder } from '../decoder/MultipartDecoder.mts';

export interface PartSummary {
  name: string;
  filename: string | undefined;
  headers: [string, string][];
}

/**
 * Converts decoder events into a comparable form: part starts become `PartSummary`, adjacent
 * body chunks are merged into a single latin1 string, and part ends become `null`.
 */
export function summarise(events: Iterable<DecodeEvent>) {
  const result: (PartSummary | string | null)[] = [];
  let body: string | null = null;
  for (const event of events) {
    if (event.type === 'bodyChunk') {
      body = (body ?? '') + event.data.toString('latin1');
      continue;
    }
    if (body !== null) {
      result.push(body);
      body = null;
    }
    if (event.type === 'partStarted') {
      result.push({ name: event.name, filename: event.filename, headers: [...event.headers] });
    } else {
      result.push(null);
    }
  }
  if (body !== null) {
    result.push(body);
  }
  return result;
}

export function feedAll(decoder: MultipartDecoder, chunks: Iterable<Uint8Array>) {
  const events: DecodeEvent[] = [];
  for (const chunk of chunks) {
    events.push(...decoder.feed(chunk));
  }
  decoder.finish();
  return events;
}

/**
 * Feeds every chunk through one shared buffer, overwriting it after each call, as a caller which
 * reuses its read buffer would. Body chunk data is copied as soon as it is returned.
 */
export function feedAllReused(decoder: MultipartDecoder, chunks: Buffer[]) {
  const shared = Buffer.alloc(Math.max(1, ...chunks.map((chunk) => chunk.byteLength)));
  const events: DecodeEvent[] = [];
  for (const chunk of chunks) {
    const size = chunk.copy(shared);
    for (const event of decoder.feed(shared.subarray(0, size))) {
      events.push(
        event.type === 'bodyChunk' ? { type: 'bodyChunk', data: Buffer.from(event.data) } : event,
      );
    }
    shared.fill(0x2d /* '-' */);
  }
  decoder.finish();
  return events;
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error: unknown) {
    return error;
  }
  throw new Error('expected an error');
}

export async function collect<T>(source: AsyncIterable<T>) {
  const result: T[] = [];
  for await (const item of source) {
    result.push(item);
  }
  return result;
}
