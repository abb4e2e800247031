import type { ReadonlyHeaders } from './spamd-headers';

export interface SpamdResponse {
  readonly protocolVersion: string;
  readonly statusCode: number;
  readonly statusMessage: string;
  readonly headers: ReadonlyHeaders;
  /** Decompressed body; undefined when the frame carried no body bytes */
  readonly body?: Buffer;
}
