/**
 * Minimal key-value store contract the mutex is built on
 *
 * Every operation must be atomic on the store side; set-if-absent is the
 * only serialization point between competing processes.
 */
export interface KeyValueStore {
  /**
   * Set `key` to `value` only if it does not exist
   * @returns true if the set happened
   */
  setIfAbsent(key: string, value: string): Promise<boolean>;

  /**
   * Set-if-absent and expiry as one atomic operation
   *
   * Optional: stores that cannot do this leave it undefined and the mutex
   * falls back to setIfAbsent followed by expire.
   */
  setIfAbsentWithTtl?(
    key: string,
    value: string,
    ttlSeconds: number,
  ): Promise<boolean>;

  /**
   * @returns the stored value, or null if the key is absent
   */
  get(key: string): Promise<string | null>;

  /**
   * Set a TTL on an existing key
   * @returns false if the key did not exist
   */
  expire(key: string, ttlSeconds: number): Promise<boolean>;

  delete(key: string): Promise<void>;

  exists(key: string): Promise<boolean>;

  /**
   * Connectivity probe for health checks
   */
  ping(): Promise<string>;
}
