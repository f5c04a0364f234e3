import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import Redis from 'ioredis';
import { REDIS_CLIENT } from './redis.constants';

/**
 * RedisService exposes the Redis commands used for locking
 * Wraps ioredis client with NestJS lifecycle management
 */
@Injectable()
export class RedisService implements OnApplicationShutdown {
  private readonly logger = new Logger(RedisService.name);

  constructor(
    @Inject(REDIS_CLIENT)
    private readonly redis: Redis,
  ) {}

  /**
   * Get a value by key
   */
  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  /**
   * Set a value only if key doesn't exist (SET NX)
   * @returns true if the key was set
   */
  async setNX(key: string, value: string): Promise<boolean> {
    const result = await this.redis.set(key, value, 'NX');
    return result === 'OK';
  }

  /**
   * Set a value with expiration only if key doesn't exist (SET EX NX)
   * @param ttlSeconds TTL in seconds
   * @returns true if the key was set
   */
  async setNXWithExpiry(
    key: string,
    value: string,
    ttlSeconds: number,
  ): Promise<boolean> {
    const result = await this.redis.set(key, value, 'EX', ttlSeconds, 'NX');
    return result === 'OK';
  }

  /**
   * Delete a key
   */
  async del(key: string): Promise<number> {
    return this.redis.del(key);
  }

  /**
   * Check if a key exists
   */
  async exists(key: string): Promise<boolean> {
    const result = await this.redis.exists(key);
    return result === 1;
  }

  /**
   * Set expiration on a key in seconds
   * @returns false if the key does not exist
   */
  async expire(key: string, seconds: number): Promise<boolean> {
    const result = await this.redis.expire(key, seconds);
    return result === 1;
  }

  /**
   * Health check - ping Redis
   */
  async ping(): Promise<string> {
    return this.redis.ping();
  }

  /**
   * Close the connection in the last shutdown phase, after the mutex
   * service has released its leases
   */
  async onApplicationShutdown(): Promise<void> {
    // lazyConnect client that never issued a command
    if (this.redis.status === 'wait') {
      this.redis.disconnect();
      return;
    }

    this.logger.log('Closing Redis connection...');
    await this.redis.quit();
    this.logger.log('Redis connection closed');
  }
}
