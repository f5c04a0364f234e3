/**
 * Mutex constants for key layout and configuration defaults
 */

// Key prefix shared by every process addressing the same lock
export const MUTEX_KEY_PREFIX = '//mutex/';

// Store injection token
export const KEY_VALUE_STORE = 'KEY_VALUE_STORE';

// Mutex configuration defaults
export const DEFAULT_MAX_TTL = 0; // seconds, 0 = never expires
export const DEFAULT_POLL_INTERVAL = 250; // milliseconds
export const DEFAULT_LOCK_TIMEOUT = 0; // seconds, 0 = wait forever

// Store drivers selectable through MUTEX_STORE
export enum StoreDriver {
  REDIS = 'redis',
  MEMORY = 'memory',
}

// Longest a blocking lock may wait over HTTP, also its default there
export const MAX_HTTP_LOCK_TIMEOUT = 300; // seconds
