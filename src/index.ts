import 'reflect-metadata';

export { SpamdModule } from './spamd/spamd.module';
export { SpamdClientService } from './spamd/spamd-client.service';
export { SPAMD_CONFIG, SPAMD_CONNECTOR } from './spamd/spamd.tokens';
export { HealthModule } from './health/health.module';
export { SpamdHealthIndicator } from './health/spamd.health';
export { default as spamdConfig, buildSpamdConfig } from './app.config';
export type { SpamdConfig } from './config/config.types';

export * from './spamd/errors/spamd.errors';
export * from './spamd/constants/status-codes.constant';
export * from './spamd/constants/header-names.constant';
export * from './spamd/message/spamd-command';
export * from './spamd/message/spamd-headers';
export * from './spamd/message/header-values';
export * from './spamd/message/request';
export * from './spamd/message/response';
export * from './spamd/codec/compression';
export * from './spamd/codec/message-encoder';
export * from './spamd/codec/message-decoder';
export * from './spamd/transport/spamd-address';
export * from './spamd/transport/spamd-connection';
export * from './spamd/pool/connection-pool';
export * from './spamd/interfaces/spamd-client.interface';
