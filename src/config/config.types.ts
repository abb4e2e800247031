import type { PoolOverflow } from '../spamd/pool/connection-pool';
import type { SpamdAddress } from '../spamd/transport/spamd-address';
import type { SpamdTlsOptions } from '../spamd/transport/spamd-connection';

/**
 * Configuration type definition for type-safe access
 */
export interface SpamdConfig {
  address: SpamdAddress;
  tls?: SpamdTlsOptions;
  protocolVersion: string;
  user?: string;
  compress: boolean;
  connectTimeout: number;
  timeout: number;
  keepAlive: boolean;
  maxConnections: number;
  poolOverflow: PoolOverflow;
  connectRetries: number;
  retryDelay: number;
  idleTimeout: number;
  maxHeaderSize: number;
  maxBodySize: number;
}
