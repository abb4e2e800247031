import { EncodeError } from '../errors/spamd.errors';
import { SPAMD_HEADERS } from '../constants/header-names.constant';
import { CRLF } from '../constants/protocol.constant';
import { parseContentLength, parseToken } from '../message/header-values';
import { SpamdHeaders } from '../message/spamd-headers';
import type { ReadonlyHeaders } from '../message/spamd-headers';
import type { SpamdRequest } from '../message/request';
import type { SpamdResponse } from '../message/response';
import { zlibCompression } from './compression';
import type { CompressionCodec } from './compression';

export interface EncodeResponseOptions {
  /** Compress the body and announce it with a Compress header */
  compress?: boolean;
}

/**
 * Serializes a request into the exact bytes spamd expects:
 * request line, header lines, blank line, raw body.
 *
 * @throws EncodeError when a caller-supplied Content-length or Compress header
 *   disagrees with what is actually sent
 */
export function encodeRequest(request: SpamdRequest, codec: CompressionCodec = zlibCompression): Buffer {
  const startLine = `${request.command} ${request.protocol}/${request.protocolVersion}`;
  try {
    const { headers, body } = prepareFrame(request.headers, request.body, request.compress, codec);
    return encodeFrame(startLine, headers, body);
  } catch (error) {
    if (error instanceof EncodeError) error.annotate({ command: request.command });
    throw error;
  }
}

/**
 * Serializes a response the way spamd writes it.
 */
export function encodeResponse(response: SpamdResponse, options: EncodeResponseOptions = {}): Buffer {
  const statusLine = `SPAMD/${response.protocolVersion} ${response.statusCode} ${response.statusMessage}`;
  const { headers, body } = prepareFrame(response.headers, response.body, options.compress ?? false, zlibCompression);
  return encodeFrame(statusLine, headers, body);
}

function prepareFrame(
  source: ReadonlyHeaders,
  rawBody: Buffer | undefined,
  compress: boolean,
  codec: CompressionCodec,
): { headers: SpamdHeaders; body: Buffer | undefined } {
  const headers = new SpamdHeaders(source);
  const compressing = compress && rawBody !== undefined;
  const body = compressing ? codec.compress(rawBody) : rawBody;

  applyCompressHeader(headers, compressing ? codec.token : undefined);
  applyContentLength(headers, body);

  return { headers, body };
}

function applyCompressHeader(headers: SpamdHeaders, token: string | undefined): void {
  const supplied = headers.get(SPAMD_HEADERS.COMPRESS);

  if (supplied === undefined) {
    if (token !== undefined) headers.append(SPAMD_HEADERS.COMPRESS, token);
    return;
  }

  if (token === undefined) {
    throw new EncodeError(`Compress header "${supplied}" is set but the body is not compressed`);
  }
  if (parseToken(supplied) !== token) {
    throw new EncodeError(`Compress header "${supplied}" does not match the "${token}" compression in use`);
  }
}

function applyContentLength(headers: SpamdHeaders, body: Buffer | undefined): void {
  const expected = body?.length ?? 0;
  const supplied = headers.get(SPAMD_HEADERS.CONTENT_LENGTH);

  if (supplied === undefined) {
    if (body !== undefined) headers.append(SPAMD_HEADERS.CONTENT_LENGTH, String(expected));
    return;
  }

  const declared = parseContentLength(supplied);
  if (declared === undefined) {
    throw new EncodeError(`Content-length header "${supplied}" is not a byte count`);
  }
  if (declared !== expected) {
    throw new EncodeError(`Content-length header declares ${declared} bytes but the body is ${expected} bytes`);
  }
}

function encodeFrame(startLine: string, headers: SpamdHeaders, body: Buffer | undefined): Buffer {
  const lines = [startLine, ...headers.entries().map(([name, value]) => `${name}: ${value}`)];
  const head = Buffer.from(lines.join(CRLF) + CRLF + CRLF, 'utf-8');
  return body === undefined || body.length === 0 ? head : Buffer.concat([head, body]);
}
