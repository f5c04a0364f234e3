import { Matches } from 'class-validator';

/**
 * Mutex names accepted over HTTP: letters, digits and `_ . : -`
 */
export const MUTEX_NAME_PATTERN = /^[A-Za-z0-9_.:-]{1,200}$/;

/**
 * Route parameters addressing a mutex
 *
 * @example
 * GET /api/mutexes/report:daily
 */
export class MutexParamsDto {
  @Matches(MUTEX_NAME_PATTERN, {
    message:
      'name must be 1-200 characters of letters, digits, "_", ".", ":" or "-"',
  })
  name!: string;
}
