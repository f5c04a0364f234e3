import { KeyValueStore } from '../interfaces';

interface StoreEntry {
  value: string;
  expiresAt: number | null;
}

/**
 * In-memory key-value store.
 *
 * Only coordinates handles inside a single process and is lost on restart.
 * Suitable for tests and single-instance deployments.
 */
export class InMemoryKeyValueStore implements KeyValueStore {
  private readonly entries = new Map<string, StoreEntry>();

  /**
   * @param now Clock in milliseconds, used for expiry
   */
  constructor(private readonly now: () => number = Date.now) {}

  async setIfAbsent(key: string, value: string): Promise<boolean> {
    if (this.read(key)) {
      return false;
    }
    this.entries.set(key, { value, expiresAt: null });
    return true;
  }

  async setIfAbsentWithTtl(
    key: string,
    value: string,
    ttlSeconds: number,
  ): Promise<boolean> {
    if (this.read(key)) {
      return false;
    }
    this.entries.set(key, {
      value,
      expiresAt: this.now() + ttlSeconds * 1000,
    });
    return true;
  }

  async get(key: string): Promise<string | null> {
    return this.read(key)?.value ?? null;
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const entry = this.read(key);
    if (!entry) {
      return false;
    }
    entry.expiresAt = this.now() + ttlSeconds * 1000;
    return true;
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.read(key) !== undefined;
  }

  async ping(): Promise<string> {
    return 'PONG';
  }

  /**
   * Milliseconds until the key expires, null if it has no TTL or is absent
   * (useful for testing)
   */
  ttl(key: string): number | null {
    const entry = this.read(key);
    if (!entry || entry.expiresAt === null) {
      return null;
    }
    return entry.expiresAt - this.now();
  }

  /**
   * Clear all entries (useful for testing)
   */
  clear(): void {
    this.entries.clear();
  }

  /**
   * Number of live entries (useful for testing)
   */
  size(): number {
    let count = 0;
    for (const key of [...this.entries.keys()]) {
      if (this.read(key)) {
        count++;
      }
    }
    return count;
  }

  /**
   * Fetch an entry, dropping it first if it has expired
   */
  private read(key: string): StoreEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt !== null && this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
