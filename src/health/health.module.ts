import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { SpamdModule } from '../spamd/spamd.module';
import { SpamdHealthIndicator } from './spamd.health';

/**
 * The HealthModule exposes the spamd health indicator to the host application's health checks.
 */
@Module({
  imports: [TerminusModule, SpamdModule],
  providers: [SpamdHealthIndicator],
  exports: [SpamdHealthIndicator],
})
export class HealthModule {}
