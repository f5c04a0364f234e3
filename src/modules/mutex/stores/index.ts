export * from './in-memory-key-value.store';
export * from './redis-key-value.store';
