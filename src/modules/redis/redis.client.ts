import { Logger } from '@nestjs/common';
import Redis from 'ioredis';
import {
  REDIS_MAX_RECONNECT_ATTEMPTS,
  REDIS_RECONNECT_MAX_DELAY_MS,
  REDIS_RECONNECT_STEP_MS,
} from './redis.constants';

/**
 * Delay before reconnect attempt `times`, or null once attempts are exhausted
 */
export function reconnectDelay(times: number): number | null {
  if (times > REDIS_MAX_RECONNECT_ATTEMPTS) {
    return null;
  }
  return Math.min(times * REDIS_RECONNECT_STEP_MS, REDIS_RECONNECT_MAX_DELAY_MS);
}

/**
 * Connection URL safe for logs: the password is masked
 */
export function redactRedisUrl(redisUrl: string): string {
  let url: URL;
  try {
    url = new URL(redisUrl);
  } catch {
    return '<invalid url>';
  }
  if (url.password) {
    url.password = '***';
  }
  return url.toString();
}

/**
 * Lazily-connecting client for the mutex store.
 * Nothing is opened until the first command.
 */
export function createRedisClient(redisUrl: string, logger: Logger): Redis {
  logger.log(`Mutex store at ${redactRedisUrl(redisUrl)}`);

  const client = new Redis(redisUrl, {
    lazyConnect: true,
    retryStrategy: (times: number) => {
      const delay = reconnectDelay(times);
      if (delay === null) {
        logger.error(
          `Mutex store unreachable after ${REDIS_MAX_RECONNECT_ATTEMPTS} reconnects`,
        );
        return null;
      }
      logger.warn(`Mutex store reconnect ${times} in ${delay}ms`);
      return delay;
    },
    // Lock calls fail fast into MutexStoreError rather than queueing
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    connectTimeout: 10000,
    keepAlive: 30000,
  });

  client.on('ready', () => logger.log('Mutex store ready'));
  client.on('error', (error: Error) =>
    logger.error(`Mutex store error: ${error.message}`),
  );
  client.on('end', () => logger.warn('Mutex store connection ended'));

  return client;
}
