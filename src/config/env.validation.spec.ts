import { Environment, validate } from './env.validation';
import { StoreDriver } from '../modules/mutex/mutex.constants';

describe('validate', () => {
  it('should fill in defaults', () => {
    const config = validate({});

    expect(config.NODE_ENV).toBe(Environment.DEVELOPMENT);
    expect(config.PORT).toBe(3000);
    expect(config.REDIS_URL).toBe('redis://localhost:6379');
    expect(config.MUTEX_STORE).toBe(StoreDriver.REDIS);
    expect(config.MUTEX_DEFAULT_TTL).toBe(0);
    expect(config.MUTEX_POLL_INTERVAL_MS).toBe(250);
  });

  it('should convert numeric strings', () => {
    const config = validate({
      PORT: '8080',
      MUTEX_STORE: 'memory',
      MUTEX_DEFAULT_TTL: '300',
      MUTEX_POLL_INTERVAL_MS: '100',
    });

    expect(config.PORT).toBe(8080);
    expect(config.MUTEX_STORE).toBe(StoreDriver.MEMORY);
    expect(config.MUTEX_DEFAULT_TTL).toBe(300);
    expect(config.MUTEX_POLL_INTERVAL_MS).toBe(100);
  });

  it('should reject an unknown store driver', () => {
    expect(() => validate({ MUTEX_STORE: 'etcd' })).toThrow(
      'Invalid environment configuration',
    );
  });

  it('should reject a negative default TTL', () => {
    expect(() => validate({ MUTEX_DEFAULT_TTL: '-1' })).toThrow(
      'MUTEX_DEFAULT_TTL must not be less than 0',
    );
  });

  it('should reject a port out of range', () => {
    expect(() => validate({ PORT: '70000' })).toThrow(
      'PORT must not be greater than 65535',
    );
  });
});
