/**
 * Thrown when a mutex is created or locked with invalid options.
 */
export class InvalidMutexOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidMutexOptionsError';
    Object.setPrototypeOf(this, InvalidMutexOptionsError.prototype);
  }
}
