import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import spamdConfig from '../app.config';
import type { SpamdConfig } from '../config/config.types';
import { SpamdClientService } from './spamd-client.service';
import { SPAMD_CONFIG } from './spamd.tokens';

/**
 * Factory provider for SpamdConfig.
 * Reads the `spamd` namespace registered by app.config and fails fast when it is missing.
 */
const spamdConfigProvider = {
  provide: SPAMD_CONFIG,
  useFactory: (configService: ConfigService): SpamdConfig => configService.getOrThrow<SpamdConfig>('spamd'),
  inject: [ConfigService],
};

/**
 * The NestJS module for the spamd client. Import it wherever messages need scoring or training.
 */
@Module({
  imports: [ConfigModule.forFeature(spamdConfig)],
  providers: [spamdConfigProvider, SpamdClientService],
  exports: [SpamdClientService, SPAMD_CONFIG],
})
export class SpamdModule {}
