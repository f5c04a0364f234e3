import { Logger } from '@nestjs/common';
import { InvalidMutexOptionsError, MutexStoreError } from './errors';
import {
  KeyValueStore,
  LockOptions,
  MutexOptions,
  WithLockResult,
} from './interfaces';
import {
  DEFAULT_LOCK_TIMEOUT,
  DEFAULT_MAX_TTL,
  DEFAULT_POLL_INTERVAL,
  MUTEX_KEY_PREFIX,
} from './mutex.constants';
import { MutexLease } from './mutex-lease';

function assertName(name: string): void {
  if (typeof name !== 'string' || name.length === 0) {
    throw new InvalidMutexOptionsError('Mutex name must be a non-empty string');
  }
}

function assertMaxTtl(maxTtl: number): void {
  if (!Number.isInteger(maxTtl) || maxTtl < 0) {
    throw new InvalidMutexOptionsError(
      `maxTtl must be a non-negative integer number of seconds, got ${maxTtl}`,
    );
  }
}

function assertPollInterval(pollInterval: number): void {
  if (!Number.isFinite(pollInterval) || pollInterval <= 0) {
    throw new InvalidMutexOptionsError(
      `pollInterval must be a positive number of milliseconds, got ${pollInterval}`,
    );
  }
}

function assertTimeout(timeout: number): void {
  if (!Number.isFinite(timeout) || timeout < 0) {
    throw new InvalidMutexOptionsError(
      `timeout must be a non-negative number of seconds, got ${timeout}`,
    );
  }
}

/**
 * Distributed mutex over a shared key-value store
 *
 * The handle keeps no ownership state: the lock *is* the record at `key`,
 * whose value is the acquisition time in seconds since epoch. Any process
 * using the same store and name addresses the same lock.
 *
 * Guarantees rest entirely on the store's atomic set-if-absent. Waiters are
 * not queued; under contention any of them may win next.
 *
 * @example
 * ```typescript
 * const mutex = new Mutex(store, 'nightly-report', { maxTtl: 300 });
 * const result = await mutex.withLock(async () => buildReport(), {
 *   timeout: 5,
 * });
 * if (!result.acquired) {
 *   // another process is building it
 * }
 * ```
 */
export class Mutex {
  private readonly logger = new Logger(Mutex.name);

  readonly name: string;
  readonly key: string;
  readonly maxTtl: number;
  readonly pollInterval: number;

  private readonly atomicTtl: boolean;
  private readonly now: () => number;

  constructor(
    private readonly store: KeyValueStore,
    name: string,
    options: MutexOptions = {},
  ) {
    const maxTtl = options.maxTtl ?? DEFAULT_MAX_TTL;
    const pollInterval = options.pollInterval ?? DEFAULT_POLL_INTERVAL;

    assertName(name);
    assertMaxTtl(maxTtl);
    assertPollInterval(pollInterval);

    this.name = name;
    this.key = `${MUTEX_KEY_PREFIX}${name}`;
    this.maxTtl = maxTtl;
    this.pollInterval = pollInterval;
    this.atomicTtl = options.atomicTtl ?? true;
    this.now = options.now ?? Date.now;
  }

  /**
   * Attempt to take the lock once, without waiting
   *
   * With a TTL, a record older than maxTtl (its holder most likely died) is
   * deleted and the set is retried once, so this can write to the store
   * even when it returns false.
   *
   * @returns true if this call acquired the lock
   * @throws {MutexStoreError} if the store fails
   */
  async tryLock(): Promise<boolean> {
    if (this.maxTtl === 0) {
      return this.setIfAbsent();
    }

    const setWithTtl = this.atomicTtl
      ? this.store.setIfAbsentWithTtl?.bind(this.store)
      : undefined;

    if (setWithTtl) {
      const value = String(this.timestamp());
      const acquired = await this.run('setIfAbsentWithTtl', () =>
        setWithTtl(this.key, value, this.maxTtl),
      );
      if (acquired) {
        this.logger.debug(`Mutex "${this.name}" acquired`);
        return true;
      }
    } else if (await this.setIfAbsent()) {
      return this.applyTtl();
    }

    return this.reclaimIfStale();
  }

  /**
   * Take the lock, polling until it is free or the timeout passes
   *
   * @returns true once acquired, false only if the timeout passed
   * @throws {MutexStoreError} if the store fails while waiting
   */
  async lock(options: LockOptions = {}): Promise<boolean> {
    const timeout = options.timeout ?? DEFAULT_LOCK_TIMEOUT;
    const pollInterval = options.pollInterval ?? this.pollInterval;

    assertTimeout(timeout);
    assertPollInterval(pollInterval);

    const startedAt = Date.now();

    while (!(await this.tryLock())) {
      if (timeout > 0 && Date.now() - startedAt > timeout * 1000) {
        this.logger.debug(
          `Mutex "${this.name}" not acquired within ${timeout}s`,
        );
        return false;
      }
      await this.sleep(pollInterval);
    }

    return true;
  }

  /**
   * Delete the lock record
   *
   * Does not check who holds the lock: calling this without holding it
   * releases another process's lock. Prefer leases, whose release only
   * runs once.
   */
  async unlock(): Promise<void> {
    await this.run('delete', () => this.store.delete(this.key));
    this.logger.debug(`Mutex "${this.name}" released`);
  }

  /**
   * Whether a lock record currently exists
   *
   * For monitoring only. Never gate a critical section on it:
   *
   * ```typescript
   * // WRONG: another process can lock between the check and tryLock
   * if (!(await mutex.isLocked())) {
   *   await mutex.tryLock();
   *   // critical section
   * }
   * ```
   */
  async isLocked(): Promise<boolean> {
    return this.run('exists', () => this.store.exists(this.key));
  }

  /**
   * Single non-blocking attempt that returns a lease on success
   */
  async tryAcquire(): Promise<MutexLease | null> {
    return (await this.tryLock()) ? this.lease() : null;
  }

  /**
   * Blocking acquire that returns a lease, or null on timeout
   */
  async acquire(options: LockOptions = {}): Promise<MutexLease | null> {
    return (await this.lock(options)) ? this.lease() : null;
  }

  /**
   * Execute a function while holding the lock
   * The lock is released on every exit path, including a thrown error
   */
  async withLock<T>(
    fn: () => Promise<T>,
    options: LockOptions = {},
  ): Promise<WithLockResult<T>> {
    const lease = await this.acquire(options);

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

  private lease(): MutexLease {
    return new MutexLease(this, new Date(this.now()));
  }

  private async setIfAbsent(): Promise<boolean> {
    const value = String(this.timestamp());
    const acquired = await this.run('setIfAbsent', () =>
      this.store.setIfAbsent(this.key, value),
    );
    if (acquired) {
      this.logger.debug(`Mutex "${this.name}" acquired`);
    }
    return acquired;
  }

  /**
   * Second half of the two-call acquisition. If the record vanished before
   * the TTL could be set, the acquisition is void.
   */
  private async applyTtl(): Promise<boolean> {
    const applied = await this.run('expire', () =>
      this.store.expire(this.key, this.maxTtl),
    );
    if (applied) {
      return true;
    }

    this.logger.debug(
      `Mutex "${this.name}" record vanished before its TTL was set`,
    );
    await this.run('delete', () => this.store.delete(this.key));
    return false;
  }

  private async reclaimIfStale(): Promise<boolean> {
    const stored = await this.run('get', () => this.store.get(this.key));

    if (stored !== null && !this.isStale(stored)) {
      return false;
    }

    this.logger.debug(`Mutex "${this.name}" record is stale, reclaiming`);
    await this.run('delete', () => this.store.delete(this.key));
    return this.setIfAbsent();
  }

  /**
   * A value that is not a number cannot prove its age and counts as stale
   */
  private isStale(stored: string): boolean {
    const acquiredAt = Number(stored);
    if (stored.trim() === '' || !Number.isFinite(acquiredAt)) {
      return true;
    }
    return this.timestamp() - acquiredAt > this.maxTtl;
  }

  private timestamp(): number {
    return Math.floor(this.now() / 1000);
  }

  private async run<T>(
    operation: string,
    request: () => Promise<T>,
  ): Promise<T> {
    try {
      return await request();
    } catch (error) {
      this.logger.error(
        `Store operation "${operation}" failed for mutex "${this.name}": ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      throw new MutexStoreError(operation, this.key, error);
    }
  }

  /**
   * Sleep for a given duration
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
