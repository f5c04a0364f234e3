import {
  IsInt,
  IsNumber,
  IsOptional,
  IsPositive,
  Max,
  Min,
} from 'class-validator';
import { MAX_HTTP_LOCK_TIMEOUT } from '../mutex.constants';
import { TryLockMutexDto } from './try-lock-mutex.dto';

/**
 * DTO for a blocking lock
 *
 * @example
 * ```json
 * { "ttl": 300, "timeout": 5, "pollInterval": 100 }
 * ```
 */
export class LockMutexDto extends TryLockMutexDto {
  /**
   * Seconds to wait for the lock
   * Requests never wait indefinitely: defaults to MAX_HTTP_LOCK_TIMEOUT
   */
  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  @Max(MAX_HTTP_LOCK_TIMEOUT)
  timeout?: number;

  /**
   * Milliseconds between attempts
   * Defaults to MUTEX_POLL_INTERVAL_MS
   */
  @IsOptional()
  @IsInt()
  @Min(10)
  @Max(10000)
  pollInterval?: number;
}
