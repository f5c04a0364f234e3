import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { LockMutexDto } from './lock-mutex.dto';
import { MutexParamsDto } from './mutex-params.dto';
import { TryLockMutexDto } from './try-lock-mutex.dto';

const failedProperties = (dto: object): string[] =>
  validateSync(dto).map((error) => error.property);

describe('Mutex DTOs', () => {
  describe('MutexParamsDto', () => {
    it.each(['report', 'job-A', 'tenant:42.sync_all'])(
      'should accept %p',
      (name) => {
        expect(failedProperties(plainToInstance(MutexParamsDto, { name }))).toEqual(
          [],
        );
      },
    );

    it.each(['', 'has space', 'a/b', 'x'.repeat(201)])(
      'should reject %p',
      (name) => {
        expect(failedProperties(plainToInstance(MutexParamsDto, { name }))).toEqual(
          ['name'],
        );
      },
    );
  });

  describe('TryLockMutexDto', () => {
    it('should accept an empty body', () => {
      expect(failedProperties(plainToInstance(TryLockMutexDto, {}))).toEqual([]);
    });

    it.each([-1, 1.5, 86401])('should reject ttl %p', (ttl) => {
      expect(
        failedProperties(plainToInstance(TryLockMutexDto, { ttl })),
      ).toEqual(['ttl']);
    });
  });

  describe('LockMutexDto', () => {
    it('should accept a full body', () => {
      const dto = plainToInstance(LockMutexDto, {
        ttl: 300,
        timeout: 2.5,
        pollInterval: 100,
      });

      expect(failedProperties(dto)).toEqual([]);
    });

    it.each([0, -1])('should reject timeout %p', (timeout) => {
      expect(
        failedProperties(plainToInstance(LockMutexDto, { timeout })),
      ).toEqual(['timeout']);
    });

    it('should reject a timeout above 300 seconds', () => {
      expect(
        failedProperties(plainToInstance(LockMutexDto, { timeout: 301 })),
      ).toEqual(['timeout']);
    });

    it('should reject a poll interval below 10ms', () => {
      expect(
        failedProperties(plainToInstance(LockMutexDto, { pollInterval: 5 })),
      ).toEqual(['pollInterval']);
    });

    it('should validate the inherited ttl', () => {
      expect(
        failedProperties(plainToInstance(LockMutexDto, { ttl: -5 })),
      ).toEqual(['ttl']);
    });
  });
});
