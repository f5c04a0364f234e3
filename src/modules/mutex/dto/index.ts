export * from './lock-mutex.dto';
export * from './mutex-params.dto';
export * from './try-lock-mutex.dto';
