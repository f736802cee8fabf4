import type { PartHeaders } from '../headers/PartHeaders.mts';

export interface PartStartedEvent {
  type: 'partStarted';
  headers: PartHeaders;
  /** the `name` parameter of the Content-Disposition header */
  name: string;
  /** the `filename` (or `filename*`) parameter of the Content-Disposition header, if present */
  filename: string | undefined;
}

export interface BodyChunkEvent {
  type: 'bodyChunk';
  /** never empty; may share memory with the chunk given to `feed` */
  data: Buffer;
}

export interface PartEndedEvent {
  type: 'partEnded';
}

export type DecodeEvent = PartStartedEvent | BodyChunkEvent | PartEndedEvent;
