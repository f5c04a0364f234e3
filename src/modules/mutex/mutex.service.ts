import {
  BeforeApplicationShutdown,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Mutex } from './mutex';
import { MutexLease } from './mutex-lease';
import {
  KeyValueStore,
  LockOptions,
  MutexOptions,
  WithLockResult,
} from './interfaces';
import {
  DEFAULT_MAX_TTL,
  DEFAULT_POLL_INTERVAL,
  KEY_VALUE_STORE,
} from './mutex.constants';

export type AcquireMutexOptions = MutexOptions & LockOptions;

/**
 * MutexService creates mutex handles on the configured store
 *
 * Leases handed out by acquire/tryAcquire/withLock are tracked and any still
 * held when the application shuts down are released. This runs before
 * RedisService closes its connection (onApplicationShutdown), and only on a
 * graceful shutdown; a killed process leaves its locks to their TTL.
 */
@Injectable()
export class MutexService implements BeforeApplicationShutdown {
  private readonly logger = new Logger(MutexService.name);
  private readonly leases = new Set<MutexLease>();
  private readonly defaultMaxTtl: number;
  private readonly defaultPollInterval: number;

  constructor(
    @Inject(KEY_VALUE_STORE)
    private readonly store: KeyValueStore,
    configService: ConfigService,
  ) {
    this.defaultMaxTtl = configService.get<number>(
      'MUTEX_DEFAULT_TTL',
      DEFAULT_MAX_TTL,
    );
    this.defaultPollInterval = configService.get<number>(
      'MUTEX_POLL_INTERVAL_MS',
      DEFAULT_POLL_INTERVAL,
    );
  }

  /**
   * Create a handle for the named lock, filling in configured defaults
   */
  create(name: string, options: MutexOptions = {}): Mutex {
    return new Mutex(this.store, name, {
      ...options,
      maxTtl: options.maxTtl ?? this.defaultMaxTtl,
      pollInterval: options.pollInterval ?? this.defaultPollInterval,
    });
  }

  /**
   * Single non-blocking attempt
   * @returns a tracked lease, or null if the lock is held elsewhere
   */
  async tryAcquire(
    name: string,
    options: MutexOptions = {},
  ): Promise<MutexLease | null> {
    const lease = await this.create(name, options).tryAcquire();
    return lease ? this.track(lease) : null;
  }

  /**
   * Blocking acquire
   * @returns a tracked lease, or null on timeout
   */
  async acquire(
    name: string,
    options: AcquireMutexOptions = {},
  ): Promise<MutexLease | null> {
    const { timeout, pollInterval, ...mutexOptions } = options;
    const lease = await this.create(name, {
      ...mutexOptions,
      pollInterval,
    }).acquire({ timeout });
    return lease ? this.track(lease) : null;
  }

  /**
   * Execute a function while holding the named lock
   *
   * @example
   * ```typescript
   * const outcome = await mutexService.withLock(
   *   'invoice:2024-05',
   *   async () => generateInvoices(),
   *   { maxTtl: 120, timeout: 10 },
   * );
   * ```
   */
  async withLock<T>(
    name: string,
    fn: () => Promise<T>,
    options: AcquireMutexOptions = {},
  ): Promise<WithLockResult<T>> {
    const lease = await this.acquire(name, options);

    if (!lease) {
      return { acquired: false, result: null };
    }

    try {
      const result = await fn();
      return { acquired: true, result };
    } finally {
      await lease.release();
    }
  }

  /**
   * Number of leases acquired through this service and not yet released
   */
  activeLeaseCount(): number {
    return this.leases.size;
  }

  /**
   * Release every lease still held by this process
   */
  async beforeApplicationShutdown(signal?: string): Promise<void> {
    if (this.leases.size === 0) {
      return;
    }

    this.logger.warn(
      `Releasing ${this.leases.size} held mutex(es) on shutdown${signal ? ` (${signal})` : ''}`,
    );

    const results = await Promise.allSettled(
      [...this.leases].map((lease) => lease.release()),
    );

    results.forEach((result) => {
      if (result.status === 'rejected') {
        this.logger.error(
          `Failed to release mutex on shutdown: ${result.reason instanceof Error ? result.reason.message : 'Unknown error'}`,
        );
      }
    });
  }

  private track(lease: MutexLease): MutexLease {
    this.leases.add(lease);
    lease.onRelease((released) => this.leases.delete(released));
    return lease;
  }
}
