import { Inject, Injectable } from '@nestjs/common';
import { HealthIndicatorService } from '@nestjs/terminus';
import { SpamdClientService } from '../spamd/spamd-client.service';
import { SPAMD_CONFIG } from '../spamd/spamd.tokens';
import { formatAddress } from '../spamd/transport/spamd-address';
import type { SpamdConfig } from '../config/config.types';
import { getErrorMessage } from '../shared/error.utils';

/**
 * Health indicator for the configured spamd daemon.
 * The daemon is considered healthy when it answers PING with PONG.
 */
@Injectable()
export class SpamdHealthIndicator {
  constructor(
    private readonly spamdClient: SpamdClientService,
    private readonly healthIndicatorService: HealthIndicatorService,
    @Inject(SPAMD_CONFIG) private readonly config: SpamdConfig,
  ) {}

  /**
   * Pings spamd. Never throws: failures are reported as `down` with the error message.
   * @param key The key to use for the health indicator result.
   */
  async isHealthy(key: string) {
    const indicator = this.healthIndicatorService.check(key);
    const address = formatAddress(this.config.address);

    try {
      const result = await this.spamdClient.ping({ timeoutMs: this.config.connectTimeout });
      if (result.pong) {
        return indicator.up({ address });
      }
      return indicator.down({ address, error: `Unexpected PING reply "${result.statusMessage}"` });
    } catch (error) {
      return indicator.down({ address, error: getErrorMessage(error) });
    }
  }
}
