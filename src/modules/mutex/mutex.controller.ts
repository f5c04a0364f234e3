import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import { MutexService } from './mutex.service';
import { MAX_HTTP_LOCK_TIMEOUT } from './mutex.constants';
import { LockMutexDto, MutexParamsDto, TryLockMutexDto } from './dto';
import {
  MutexAcquireResponse,
  MutexReleaseResponse,
  MutexStatusResponse,
} from './interfaces';
import { BaseResponse } from '../../common/interfaces/base-response.interface';

/**
 * MutexController exposes named mutexes over HTTP
 *
 * Endpoints:
 * - GET /api/mutexes/:name - Whether the lock record exists
 * - POST /api/mutexes/:name/try-lock - Single non-blocking attempt
 * - POST /api/mutexes/:name/lock - Blocking attempt with timeout
 * - DELETE /api/mutexes/:name - Delete the lock record
 *
 * Locks taken here belong to the remote caller, so they are not tracked as
 * leases and outlive this process unless their TTL runs out. DELETE does not
 * check ownership.
 */
@Controller('mutexes')
export class MutexController {
  constructor(private readonly mutexService: MutexService) {}

  /**
   * Inspect a mutex
   *
   * Response 200: {
   *   "success": true,
   *   "data": { "name": "report", "key": "//mutex/report", "locked": true },
   *   "timestamp": "2024-01-15T10:30:00.000Z"
   * }
   */
  @Get(':name')
  async status(
    @Param() params: MutexParamsDto,
  ): Promise<BaseResponse<MutexStatusResponse>> {
    const mutex = this.mutexService.create(params.name);
    const locked = await mutex.isLocked();

    return this.respond({ name: mutex.name, key: mutex.key, locked });
  }

  /**
   * Try to lock once without waiting
   *
   * @example
   * POST /api/mutexes/report/try-lock
   * Body: { "ttl": 300 }
   */
  @Post(':name/try-lock')
  @HttpCode(HttpStatus.OK)
  async tryLock(
    @Param() params: MutexParamsDto,
    @Body() dto: TryLockMutexDto,
  ): Promise<BaseResponse<MutexAcquireResponse>> {
    const mutex = this.mutexService.create(params.name, { maxTtl: dto.ttl });
    const acquired = await mutex.tryLock();

    return this.respond({ name: mutex.name, acquired });
  }

  /**
   * Lock, waiting up to `timeout` seconds (MAX_HTTP_LOCK_TIMEOUT when omitted)
   *
   * @example
   * POST /api/mutexes/report/lock
   * Body: { "ttl": 300, "timeout": 5, "pollInterval": 100 }
   */
  @Post(':name/lock')
  @HttpCode(HttpStatus.OK)
  async lock(
    @Param() params: MutexParamsDto,
    @Body() dto: LockMutexDto,
  ): Promise<BaseResponse<MutexAcquireResponse>> {
    const mutex = this.mutexService.create(params.name, {
      maxTtl: dto.ttl,
      pollInterval: dto.pollInterval,
    });
    const acquired = await mutex.lock({
      timeout: dto.timeout ?? MAX_HTTP_LOCK_TIMEOUT,
    });

    return this.respond({ name: mutex.name, acquired });
  }

  /**
   * Unlock a mutex
   */
  @Delete(':name')
  @HttpCode(HttpStatus.OK)
  async unlock(
    @Param() params: MutexParamsDto,
  ): Promise<BaseResponse<MutexReleaseResponse>> {
    const mutex = this.mutexService.create(params.name);
    await mutex.unlock();

    return this.respond({ name: mutex.name, released: true });
  }

  private respond<T>(data: T): BaseResponse<T> {
    return {
      success: true,
      data,
      timestamp: new Date().toISOString(),
    };
  }
}
