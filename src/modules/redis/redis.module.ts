import { Global, Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { createRedisClient } from './redis.client';
import { DEFAULT_REDIS_URL, REDIS_CLIENT } from './redis.constants';
import { RedisService } from './redis.service';

/**
 * Redis connection backing the mutex store.
 * Global so MutexModule's store factory can inject RedisService.
 */
@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: REDIS_CLIENT,
      useFactory: (configService: ConfigService): Redis =>
        createRedisClient(
          configService.get<string>('REDIS_URL') || DEFAULT_REDIS_URL,
          new Logger('RedisModule'),
        ),
      inject: [ConfigService],
    },
    RedisService,
  ],
  exports: [RedisService, REDIS_CLIENT],
})
export class RedisModule {}
