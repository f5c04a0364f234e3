import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { KeyValueStore } from '../mutex/interfaces';
import { KEY_VALUE_STORE, StoreDriver } from '../mutex/mutex.constants';

/**
 * Health check result interface
 */
export interface HealthCheckResult {
  status: 'ok' | 'error';
  timestamp: string;
  uptime: number;
  services: {
    store: ServiceHealth;
  };
}

/**
 * Individual service health status
 */
export interface ServiceHealth {
  driver: string;
  status: 'up' | 'down';
  latency?: number;
  error?: string;
}

/**
 * HealthService checks that the mutex store answers
 */
@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);
  private readonly startTime = Date.now();
  private readonly driver: string;

  constructor(
    @Inject(KEY_VALUE_STORE)
    private readonly store: KeyValueStore,
    configService: ConfigService,
  ) {
    this.driver = configService.get<string>('MUTEX_STORE', StoreDriver.REDIS);
  }

  /**
   * Perform full health check on all dependencies
   */
  async check(): Promise<HealthCheckResult> {
    const storeHealth = await this.checkStore();

    return {
      status: storeHealth.status === 'up' ? 'ok' : 'error',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      services: {
        store: storeHealth,
      },
    };
  }

  /**
   * Check store connection health
   */
  private async checkStore(): Promise<ServiceHealth> {
    const start = Date.now();

    try {
      const pong = await this.store.ping();

      if (pong !== 'PONG') {
        return {
          driver: this.driver,
          status: 'down',
          error: `Unexpected ping response: ${pong}`,
        };
      }

      return {
        driver: this.driver,
        status: 'up',
        latency: Date.now() - start,
      };
    } catch (error) {
      this.logger.error(
        `Store health check failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return {
        driver: this.driver,
        status: 'down',
        latency: Date.now() - start,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }
}
