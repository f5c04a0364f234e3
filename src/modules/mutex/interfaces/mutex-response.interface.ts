/**
 * Response data for GET /api/mutexes/:name
 */
export interface MutexStatusResponse {
  name: string;
  key: string;
  locked: boolean;
}

/**
 * Response data for try-lock and lock
 */
export interface MutexAcquireResponse {
  name: string;
  acquired: boolean;
}

/**
 * Response data for DELETE /api/mutexes/:name
 */
export interface MutexReleaseResponse {
  name: string;
  released: true;
}
