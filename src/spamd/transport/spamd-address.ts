import { InvalidRequestError } from '../errors/spamd.errors';
import { DEFAULT_SPAMD_PORT } from '../constants/protocol.constant';

export interface TcpAddress {
  kind: 'tcp';
  host: string;
  port: number;
}

export interface UnixAddress {
  kind: 'unix';
  path: string;
}

/** Where spamd listens: a TCP endpoint or a Unix domain socket */
export type SpamdAddress = TcpAddress | UnixAddress;

const UNIX_PREFIX = 'unix:';
const BRACKETED_HOST = /^\[([^\]]+)\](?::(.*))?$/;

function parsePort(raw: string, input: string): number {
  const port = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidRequestError(`Invalid port "${raw}" in address "${input}"`);
  }
  return port;
}

/**
 * Parses `host`, `host:port`, `[v6]:port`, `unix:/path`, `/abs/path` or `./rel/path`.
 * The port defaults to 783.
 *
 * @throws InvalidRequestError on an empty address or an invalid port
 */
export function parseAddress(input: string): SpamdAddress {
  const value = input.trim();
  if (value.length === 0) {
    throw new InvalidRequestError('spamd address must not be empty');
  }

  if (value.startsWith(UNIX_PREFIX)) {
    const path = value.slice(UNIX_PREFIX.length);
    if (path.length === 0) {
      throw new InvalidRequestError(`Missing socket path in address "${input}"`);
    }
    return { kind: 'unix', path };
  }
  if (value.startsWith('/') || value.startsWith('./') || value.startsWith('../')) {
    return { kind: 'unix', path: value };
  }

  const bracketed = BRACKETED_HOST.exec(value);
  if (bracketed) {
    const port = bracketed[2];
    return {
      kind: 'tcp',
      host: bracketed[1],
      port: port === undefined ? DEFAULT_SPAMD_PORT : parsePort(port, input),
    };
  }

  const colon = value.lastIndexOf(':');
  // More than one colon without brackets is a bare IPv6 address
  if (colon === -1 || value.indexOf(':') !== colon) {
    return { kind: 'tcp', host: value, port: DEFAULT_SPAMD_PORT };
  }

  const host = value.slice(0, colon);
  if (host.length === 0) {
    throw new InvalidRequestError(`Missing host in address "${input}"`);
  }
  return { kind: 'tcp', host, port: parsePort(value.slice(colon + 1), input) };
}

export function formatAddress(address: SpamdAddress): string {
  if (address.kind === 'unix') {
    return `${UNIX_PREFIX}${address.path}`;
  }
  const host = address.host.includes(':') ? `[${address.host}]` : address.host;
  return `${host}:${address.port}`;
}
