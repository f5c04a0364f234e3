import { ConfigModule } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { RedisModule } from '../redis/redis.module';
import { REDIS_CLIENT } from '../redis/redis.constants';
import { MutexModule } from './mutex.module';
import { MutexService } from './mutex.service';

describe('MutexModule', () => {
  let calls: string[];
  let moduleRef: TestingModule;

  const createClient = () => {
    let closed = false;
    return {
      status: 'ready',
      set: jest.fn(async () => {
        calls.push('set');
        return 'OK';
      }),
      del: jest.fn(async () => {
        if (closed) {
          throw new Error('Connection is closed.');
        }
        calls.push('del');
        return 1;
      }),
      quit: jest.fn(async () => {
        closed = true;
        calls.push('quit');
        return 'OK';
      }),
      disconnect: jest.fn(),
    };
  };

  beforeEach(async () => {
    calls = [];
    moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true }),
        RedisModule,
        MutexModule,
      ],
    })
      .overrideProvider(REDIS_CLIENT)
      .useValue(createClient())
      .compile();
    await moduleRef.init();
  });

  describe('shutdown', () => {
    it('should release held leases through Redis before the connection closes', async () => {
      const service = moduleRef.get(MutexService);
      const lease = await service.tryAcquire('job-A');

      await moduleRef.close();

      expect(calls).toEqual(['set', 'del', 'quit']);
      expect(lease?.isReleased()).toBe(true);
      expect(service.activeLeaseCount()).toBe(0);
    });

    it('should only close the connection when nothing is held', async () => {
      await moduleRef.close();

      expect(calls).toEqual(['quit']);
    });
  });
});
