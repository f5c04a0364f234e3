import type { Mutex } from './mutex';

type ReleaseListener = (lease: MutexLease) => void;

/**
 * A held acquisition of a mutex
 *
 * Returned by Mutex.acquire / Mutex.tryAcquire. Release it on every exit path
 * (typically in a `finally` block); release is idempotent, so a lease never
 * deletes a record that a later holder created after this one released.
 */
export class MutexLease {
  private released = false;
  private readonly listeners: ReleaseListener[] = [];

  constructor(
    readonly mutex: Mutex,
    readonly acquiredAt: Date,
  ) {}

  get name(): string {
    return this.mutex.name;
  }

  isReleased(): boolean {
    return this.released;
  }

  /**
   * Register a callback run once the lease has been released
   */
  onRelease(listener: ReleaseListener): void {
    this.listeners.push(listener);
  }

  /**
   * Unlock the mutex once; later calls are no-ops
   */
  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;

    try {
      await this.mutex.unlock();
    } catch (error) {
      this.released = false;
      throw error;
    }

    for (const listener of this.listeners) {
      listener(this);
    }
  }
}
