import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validate } from './config/env.validation';

// Feature modules
import { RedisModule } from './modules/redis/redis.module';
import { MutexModule } from './modules/mutex/mutex.module';
import { HealthModule } from './modules/health/health.module';

/**
 * AppModule - Root module of the mutex service
 *
 * Configuration:
 * - ConfigModule: Global configuration with .env support, validated on startup
 *
 * Feature Modules:
 * - RedisModule: Redis client (global, connects lazily)
 * - MutexModule: Named distributed mutexes and their HTTP endpoints
 * - HealthModule: Store health checks
 */
@Module({
  imports: [
    // Global configuration
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validate,
    }),

    // Feature modules
    RedisModule,
    MutexModule,
    HealthModule,
  ],
})
export class AppModule {}
