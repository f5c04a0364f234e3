/**
 * Thrown when the key-value store fails while the mutex talks to it.
 *
 * Distinct from "not acquired": it means the coordination store itself is
 * unavailable, not that another process holds the lock.
 */
export class MutexStoreError extends Error {
  readonly operation: string;
  readonly key: string;

  constructor(operation: string, key: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Store operation "${operation}" failed for "${key}": ${reason}`, {
      cause,
    });
    this.name = 'MutexStoreError';
    this.operation = operation;
    this.key = key;
    Object.setPrototypeOf(this, MutexStoreError.prototype);
  }
}
