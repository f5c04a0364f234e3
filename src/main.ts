import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create(AppModule);

  // Get configuration service
  const configService = app.get(ConfigService);
  const nodeEnv = configService.get<string>('NODE_ENV', 'development');

  // Set global API prefix
  app.setGlobalPrefix('api');

  // Register global exception filter
  app.useGlobalFilters(new HttpExceptionFilter());

  // Global validation pipe with transform enabled
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true, // Automatically transform payloads to DTO instances
      whitelist: true, // Strip properties not in DTO
      forbidNonWhitelisted: true, // Throw error for unknown properties
      transformOptions: {
        enableImplicitConversion: true, // Enable type coercion
      },
    }),
  );

  // Held mutexes are released on SIGTERM/SIGINT
  app.enableShutdownHooks();

  // Get port from environment or default to 3000
  const port = configService.get<number>('PORT', 3000);

  await app.listen(port);

  logger.log(`Mutex service is running on: http://localhost:${port}/api`);
  logger.log(`Environment: ${nodeEnv}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Failed to start: ${error instanceof Error ? error.message : 'Unknown error'}`,
  );
  process.exit(1);
});
