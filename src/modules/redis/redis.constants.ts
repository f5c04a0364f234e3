/**
 * Redis constants for connection handling
 */

// Redis injection token
export const REDIS_CLIENT = 'REDIS_CLIENT';

export const DEFAULT_REDIS_URL = 'redis://localhost:6379';

// Reconnection settings
export const REDIS_MAX_RECONNECT_ATTEMPTS = 10;
export const REDIS_RECONNECT_STEP_MS = 100;
export const REDIS_RECONNECT_MAX_DELAY_MS = 1000;
