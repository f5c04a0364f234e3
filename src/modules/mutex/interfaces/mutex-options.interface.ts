/**
 * Options for creating a mutex handle
 */
export interface MutexOptions {
  /** Max lifetime of the lock in seconds, 0 means it never expires */
  maxTtl?: number;

  /** Default delay between attempts of a blocking lock, in milliseconds */
  pollInterval?: number;

  /**
   * Use the store's atomic set-if-absent-with-expiry when it has one
   * (default: true)
   */
  atomicTtl?: boolean;

  /** Clock in milliseconds since epoch (default: Date.now) */
  now?: () => number;
}

/**
 * Options for a blocking lock
 */
export interface LockOptions {
  /** Maximum time to wait in seconds, 0 means wait forever */
  timeout?: number;

  /** Delay between attempts in milliseconds */
  pollInterval?: number;
}

/**
 * Outcome of running a callback under a lock
 */
export type WithLockResult<T> =
  | { acquired: true; result: T }
  | { acquired: false; result: null };
