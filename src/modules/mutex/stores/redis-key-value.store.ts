import { RedisService } from '../../redis/redis.service';
import { KeyValueStore } from '../interfaces';

/**
 * KeyValueStore backed by Redis
 *
 * setIfAbsentWithTtl maps to a single `SET key value EX ttl NX`, so a lock
 * with a TTL is never left behind without one.
 */
export class RedisKeyValueStore implements KeyValueStore {
  constructor(private readonly redisService: RedisService) {}

  async setIfAbsent(key: string, value: string): Promise<boolean> {
    return this.redisService.setNX(key, value);
  }

  async setIfAbsentWithTtl(
    key: string,
    value: string,
    ttlSeconds: number,
  ): Promise<boolean> {
    return this.redisService.setNXWithExpiry(key, value, ttlSeconds);
  }

  async get(key: string): Promise<string | null> {
    return this.redisService.get(key);
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    return this.redisService.expire(key, ttlSeconds);
  }

  async delete(key: string): Promise<void> {
    await this.redisService.del(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.redisService.exists(key);
  }

  async ping(): Promise<string> {
    return this.redisService.ping();
  }
}
