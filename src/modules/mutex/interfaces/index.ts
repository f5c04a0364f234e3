export * from './key-value-store.interface';
export * from './mutex-options.interface';
export * from './mutex-response.interface';
