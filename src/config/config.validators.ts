import { Logger } from '@nestjs/common';
import type { PoolOverflow } from '../spamd/pool/connection-pool';
import type { SpamdAddress } from '../spamd/transport/spamd-address';

const logger = new Logger('ConfigValidation');

const PROTOCOL_VERSION_PATTERN = /^\d+\.\d+$/;

export function isValidProtocolVersion(version: string): boolean {
  return PROTOCOL_VERSION_PATTERN.test(version);
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

/**
 * Header values are written verbatim, so a line break would inject extra headers.
 */
export function isValidHeaderValue(value: string): boolean {
  return !/[\r\n]/.test(value);
}

/**
 * Rejects TLS towards a Unix socket. spamd only speaks TLS on its TCP listener.
 */
export function validateTransportConfig(address: SpamdAddress, tlsEnabled: boolean): void {
  if (tlsEnabled && address.kind === 'unix') {
    throw new Error(
      `SPAMD_TLS=true cannot be used with the Unix socket ${address.path}. ` +
        'Either disable TLS or point SPAMD_ADDRESS/SPAMD_HOST at spamd\'s TCP listener.',
    );
  }
}

/**
 * Validates pool sizing and logs warnings for settings that serialize every request.
 */
export function validatePoolConfig(maxConnections: number, overflow: PoolOverflow, keepAlive: boolean): void {
  if (maxConnections < 1) {
    throw new Error(`SPAMD_MAX_CONNECTIONS must be at least 1 (got ${maxConnections})`);
  }

  if (keepAlive && maxConnections === 1 && overflow === 'fail') {
    logger.warn(
      'SPAMD_KEEP_ALIVE=true with SPAMD_MAX_CONNECTIONS=1 and SPAMD_POOL_OVERFLOW=fail. ' +
        'Every request made while the single connection is busy will fail with PoolExhausted.',
    );
  }
}
