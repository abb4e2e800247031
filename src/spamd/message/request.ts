import { InvalidRequestError, isSpamdError } from '../errors/spamd.errors';
import { SINGLETON_HEADERS } from '../constants/header-names.constant';
import { DEFAULT_PROTOCOL_VERSION } from '../constants/protocol.constant';
import { SpamdCommand, commandTraits } from './spamd-command';
import { SpamdHeaders } from './spamd-headers';
import type { HeaderInit, ReadonlyHeaders } from './spamd-headers';

/**
 * Token written after the command on the request line. spamd expects SPAMC.
 */
export type RequestProtocol = 'SPAMC' | 'SPAMD';

export type MessageBody = Buffer | Uint8Array | string;

export interface SpamdRequest {
  readonly command: SpamdCommand;
  readonly protocol: RequestProtocol;
  readonly protocolVersion: string;
  readonly headers: ReadonlyHeaders;
  readonly body?: Buffer;
  /** Compress the body before sending it */
  readonly compress: boolean;
}

export interface NewRequestOptions {
  protocol?: RequestProtocol;
  protocolVersion?: string;
  compress?: boolean;
}

const VERSION_PATTERN = /^\d+\.\d+$/;

function toBuffer(body: MessageBody): Buffer {
  return typeof body === 'string' ? Buffer.from(body, 'utf-8') : Buffer.from(body);
}

function assertNoDuplicateSingletons(command: SpamdCommand, headers: SpamdHeaders): void {
  const seen = new Set<string>();
  for (const [name] of headers) {
    const key = name.toLowerCase();
    if (!SINGLETON_HEADERS.includes(key)) continue;
    if (seen.has(key)) {
      throw new InvalidRequestError(`Header "${name}" may only appear once`, { command });
    }
    seen.add(key);
  }
}

/**
 * Builds a validated, immutable request.
 *
 * @throws InvalidRequestError when the body does not match the command, a header name is invalid,
 *   a singleton header repeats or the protocol version is malformed
 * @throws InvalidHeaderValueError when a header value contains CR or LF
 */
export function newRequest(
  command: SpamdCommand,
  headers?: HeaderInit,
  body?: MessageBody,
  options: NewRequestOptions = {},
): SpamdRequest {
  const { requiresBody } = commandTraits(command);

  if (requiresBody && body === undefined) {
    throw new InvalidRequestError(`${command} requires a message body`, { command });
  }
  if (!requiresBody && body !== undefined) {
    throw new InvalidRequestError(`${command} does not take a message body`, { command });
  }

  const protocolVersion = options.protocolVersion ?? DEFAULT_PROTOCOL_VERSION;
  if (!VERSION_PATTERN.test(protocolVersion)) {
    throw new InvalidRequestError(`Invalid protocol version "${protocolVersion}"`, { command });
  }

  let headerList: SpamdHeaders;
  try {
    headerList = new SpamdHeaders(headers);
  } catch (error) {
    if (isSpamdError(error)) error.annotate({ command });
    throw error;
  }
  assertNoDuplicateSingletons(command, headerList);

  return Object.freeze({
    command,
    protocol: options.protocol ?? 'SPAMC',
    protocolVersion,
    headers: headerList,
    body: body === undefined ? undefined : toBuffer(body),
    compress: options.compress ?? false,
  });
}
