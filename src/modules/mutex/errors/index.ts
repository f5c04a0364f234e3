export * from './invalid-mutex-options.error';
export * from './mutex-store.error';
