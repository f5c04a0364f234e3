import { IsInt, IsOptional, Max, Min } from 'class-validator';

/**
 * DTO for a single non-blocking lock attempt
 *
 * @example
 * ```json
 * { "ttl": 300 }
 * ```
 */
export class TryLockMutexDto {
  /**
   * Max lifetime of the lock in seconds, 0 = never expires
   * Defaults to MUTEX_DEFAULT_TTL
   */
  @IsOptional()
  @IsInt({ message: 'ttl must be an integer number of seconds' })
  @Min(0)
  @Max(86400)
  ttl?: number;
}
