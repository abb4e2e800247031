import { registerAs } from '@nestjs/config';
import * as process from 'process';
import {
  DEFAULT_CONNECT_RETRIES,
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_IDLE_TIMEOUT,
  DEFAULT_MAX_CONNECTIONS,
  DEFAULT_POOL_OVERFLOW,
  DEFAULT_REQUEST_TIMEOUT,
  DEFAULT_RETRY_DELAY,
  DEFAULT_SPAMD_HOST,
} from './config/config.constants';
import {
  parseNumberWithDefault,
  parseOptionalBoolean,
  parsePoolOverflow,
  parseStringWithDefault,
  readTlsBuffer,
} from './config/config.parsers';
import {
  isValidHeaderValue,
  isValidPort,
  isValidProtocolVersion,
  validatePoolConfig,
  validateTransportConfig,
} from './config/config.validators';
import type { SpamdConfig } from './config/config.types';
import {
  DEFAULT_MAX_BODY_BYTES,
  DEFAULT_MAX_HEADER_BYTES,
  DEFAULT_PROTOCOL_VERSION,
  DEFAULT_SPAMD_PORT,
} from './spamd/constants/protocol.constant';
import { parseAddress } from './spamd/transport/spamd-address';
import type { SpamdAddress } from './spamd/transport/spamd-address';
import type { SpamdTlsOptions } from './spamd/transport/spamd-connection';

/**
 * Resolves where spamd listens.
 *
 * Precedence:
 * - SPAMD_ADDRESS: `host`, `host:port`, `[v6]:port`, `unix:/path` or a socket path
 * - SPAMD_SOCKET_PATH: Unix domain socket
 * - SPAMD_HOST / SPAMD_PORT (default: localhost:783)
 */
function buildAddress(): SpamdAddress {
  const address = process.env.SPAMD_ADDRESS?.trim();
  if (address) {
    return parseAddress(address);
  }

  const socketPath = process.env.SPAMD_SOCKET_PATH?.trim();
  if (socketPath) {
    return { kind: 'unix', path: socketPath };
  }

  const port = parseNumberWithDefault(process.env.SPAMD_PORT, DEFAULT_SPAMD_PORT);
  if (!isValidPort(port)) {
    throw new Error(`Invalid SPAMD_PORT: "${port}" (must be between 1 and 65535)`);
  }

  return {
    kind: 'tcp',
    host: parseStringWithDefault(process.env.SPAMD_HOST, DEFAULT_SPAMD_HOST),
    port,
  };
}

/**
 * Builds TLS client options when SPAMD_TLS is enabled.
 *
 * Optional environment variables:
 * - SPAMD_TLS_CA_PATH: PEM bundle that signed spamd's certificate
 * - SPAMD_TLS_REJECT_UNAUTHORIZED: Verify the certificate chain (default: true)
 */
function buildTlsOptions(): SpamdTlsOptions | undefined {
  if (!parseOptionalBoolean(process.env.SPAMD_TLS, false)) {
    return undefined;
  }

  return {
    ca: readTlsBuffer(process.env.SPAMD_TLS_CA_PATH),
    rejectUnauthorized: parseOptionalBoolean(process.env.SPAMD_TLS_REJECT_UNAUTHORIZED, true),
  };
}

function buildProtocolVersion(): string {
  const version = parseStringWithDefault(process.env.SPAMD_PROTOCOL_VERSION, DEFAULT_PROTOCOL_VERSION);
  if (!isValidProtocolVersion(version)) {
    throw new Error(`Invalid SPAMD_PROTOCOL_VERSION: "${version}" (expected <major>.<minor>, e.g. 1.5)`);
  }
  return version;
}

function buildUser(): string | undefined {
  const user = process.env.SPAMD_USER?.trim();
  if (!user) {
    return undefined;
  }
  if (!isValidHeaderValue(user)) {
    throw new Error('SPAMD_USER must not contain line breaks');
  }
  return user;
}

/**
 * Builds the spamd client configuration from environment variables.
 *
 * Optional environment variables:
 * - SPAMD_COMPRESS: zlib-compress request bodies (default: false)
 * - SPAMD_CONNECT_TIMEOUT: Connect and TLS handshake timeout in ms (default: 5000)
 * - SPAMD_TIMEOUT: Deadline for a whole exchange in ms (default: 30000)
 * - SPAMD_KEEP_ALIVE: Pool connections between requests (default: false, spamd closes after each response)
 * - SPAMD_MAX_CONNECTIONS: Concurrent connections per address (default: 10)
 * - SPAMD_POOL_OVERFLOW: `queue` or `fail` when all connections are busy (default: queue)
 * - SPAMD_CONNECT_RETRIES: Extra attempts after a failed connect (default: 2)
 * - SPAMD_RETRY_DELAY: Initial retry backoff in ms, doubled per attempt (default: 100)
 * - SPAMD_IDLE_TIMEOUT: Idle pooled connection lifetime in ms (default: 30000)
 * - SPAMD_MAX_HEADER_SIZE / SPAMD_MAX_BODY_SIZE: Response size limits in bytes
 *
 * @throws {Error} If a value is malformed or the combination is unusable
 */
export function buildSpamdConfig(): SpamdConfig {
  const address = buildAddress();
  const tls = buildTlsOptions();
  validateTransportConfig(address, tls !== undefined);

  const keepAlive = parseOptionalBoolean(process.env.SPAMD_KEEP_ALIVE, false);
  const maxConnections = parseNumberWithDefault(process.env.SPAMD_MAX_CONNECTIONS, DEFAULT_MAX_CONNECTIONS);
  const poolOverflow = parsePoolOverflow(process.env.SPAMD_POOL_OVERFLOW, DEFAULT_POOL_OVERFLOW);
  validatePoolConfig(maxConnections, poolOverflow, keepAlive);

  return {
    address,
    tls,
    protocolVersion: buildProtocolVersion(),
    user: buildUser(),
    compress: parseOptionalBoolean(process.env.SPAMD_COMPRESS, false),
    connectTimeout: parseNumberWithDefault(process.env.SPAMD_CONNECT_TIMEOUT, DEFAULT_CONNECT_TIMEOUT),
    timeout: parseNumberWithDefault(process.env.SPAMD_TIMEOUT, DEFAULT_REQUEST_TIMEOUT),
    keepAlive,
    maxConnections,
    poolOverflow,
    connectRetries: parseNumberWithDefault(process.env.SPAMD_CONNECT_RETRIES, DEFAULT_CONNECT_RETRIES),
    retryDelay: parseNumberWithDefault(process.env.SPAMD_RETRY_DELAY, DEFAULT_RETRY_DELAY),
    idleTimeout: parseNumberWithDefault(process.env.SPAMD_IDLE_TIMEOUT, DEFAULT_IDLE_TIMEOUT),
    maxHeaderSize: parseNumberWithDefault(process.env.SPAMD_MAX_HEADER_SIZE, DEFAULT_MAX_HEADER_BYTES),
    maxBodySize: parseNumberWithDefault(process.env.SPAMD_MAX_BODY_SIZE, DEFAULT_MAX_BODY_BYTES),
  };
}

/**
 * Register Config spamd
 */
export default registerAs('spamd', buildSpamdConfig);
