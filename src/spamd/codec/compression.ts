import { deflateSync, inflateSync } from 'zlib';
import { ZLIB_COMPRESSION } from '../constants/header-names.constant';

/**
 * Body compression negotiated through the Compress header.
 */
export interface CompressionCodec {
  readonly token: string;
  compress(body: Buffer): Buffer;
  /** Throws when the output would exceed maxOutputLength */
  decompress(body: Buffer, maxOutputLength?: number): Buffer;
}

export const zlibCompression: CompressionCodec = {
  token: ZLIB_COMPRESSION,
  compress: (body) => deflateSync(body),
  decompress: (body, maxOutputLength) =>
    maxOutputLength === undefined ? inflateSync(body) : inflateSync(body, { maxOutputLength }),
};

const CODECS: ReadonlyMap<string, CompressionCodec> = new Map([[zlibCompression.token, zlibCompression]]);

export function getCompressionCodec(token: string): CompressionCodec | undefined {
  return CODECS.get(token.toLowerCase());
}
