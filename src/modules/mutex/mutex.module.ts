import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { RedisService } from '../redis/redis.service';
import { MutexController } from './mutex.controller';
import { MutexService } from './mutex.service';
import { KeyValueStore } from './interfaces';
import { InMemoryKeyValueStore, RedisKeyValueStore } from './stores';
import { KEY_VALUE_STORE, StoreDriver } from './mutex.constants';

/**
 * MutexModule provides named distributed mutexes
 *
 * The store behind them is chosen by MUTEX_STORE:
 * - redis (default): shared across processes through RedisModule
 * - memory: this process only
 */
@Module({
  imports: [ConfigModule],
  controllers: [MutexController],
  providers: [
    {
      provide: KEY_VALUE_STORE,
      useFactory: (
        configService: ConfigService,
        redisService: RedisService,
      ): KeyValueStore => {
        const logger = new Logger('MutexModule');
        const driver = configService.get<StoreDriver>(
          'MUTEX_STORE',
          StoreDriver.REDIS,
        );

        logger.log(`Mutex store driver: ${driver}`);

        if (driver === StoreDriver.MEMORY) {
          return new InMemoryKeyValueStore();
        }
        return new RedisKeyValueStore(redisService);
      },
      inject: [ConfigService, RedisService],
    },
    MutexService,
  ],
  exports: [MutexService, KEY_VALUE_STORE],
})
export class MutexModule {}
