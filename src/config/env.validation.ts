import { plainToInstance } from 'class-transformer';
import {
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { StoreDriver } from '../modules/mutex/mutex.constants';

export enum Environment {
  DEVELOPMENT = 'development',
  PRODUCTION = 'production',
  TEST = 'test',
}

/**
 * Environment variables read by the application
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsEnum(Environment)
  NODE_ENV: Environment = Environment.DEVELOPMENT;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsOptional()
  @IsString()
  REDIS_URL: string = 'redis://localhost:6379';

  @IsOptional()
  @IsEnum(StoreDriver)
  MUTEX_STORE: StoreDriver = StoreDriver.REDIS;

  /** Default lock TTL in seconds, 0 = never expires */
  @IsOptional()
  @IsInt()
  @Min(0)
  MUTEX_DEFAULT_TTL: number = 0;

  @IsOptional()
  @IsInt()
  @Min(1)
  MUTEX_POLL_INTERVAL_MS: number = 250;
}

/**
 * Validate and convert raw environment values for ConfigModule
 * @throws Error listing every invalid variable
 */
export function validate(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validatedConfig;
}
