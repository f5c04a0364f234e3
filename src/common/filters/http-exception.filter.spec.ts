import {
  BadRequestException,
  ConflictException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { HttpExceptionFilter } from './http-exception.filter';
import {
  InvalidMutexOptionsError,
  MutexStoreError,
} from '../../modules/mutex/errors';

describe('HttpExceptionFilter', () => {
  let filter: HttpExceptionFilter;
  let json: jest.Mock;
  let status: jest.Mock;
  let host: ExecutionContextHost;

  beforeEach(() => {
    filter = new HttpExceptionFilter();
    json = jest.fn();
    status = jest.fn().mockReturnValue({ json });
    host = new ExecutionContextHost([
      { url: '/api/mutexes/report/try-lock' },
      { status },
    ]);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should map store failures to 503', () => {
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);

    filter.catch(
      new MutexStoreError('setIfAbsent', '//mutex/report', new Error('down')),
      host,
    );

    expect(status).toHaveBeenCalledWith(503);
    expect(json).toHaveBeenCalledWith({
      statusCode: 503,
      errorCode: 'STORE_UNAVAILABLE',
      message: 'The mutex store is unavailable',
      timestamp: expect.any(String),
      path: '/api/mutexes/report/try-lock',
      details: { operation: 'setIfAbsent', key: '//mutex/report' },
    });
  });

  it('should map invalid mutex options to 400', () => {
    filter.catch(new InvalidMutexOptionsError('maxTtl must be positive'), host);

    expect(status).toHaveBeenCalledWith(400);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({
        errorCode: 'INVALID_MUTEX_OPTIONS',
        message: 'maxTtl must be positive',
      }),
    );
  });

  it('should join validation messages', () => {
    filter.catch(
      new BadRequestException([
        'ttl must not be less than 0',
        'timeout must not be greater than 300',
      ]),
      host,
    );

    expect(status).toHaveBeenCalledWith(400);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({
        errorCode: 'BAD_REQUEST',
        message:
          'ttl must not be less than 0; timeout must not be greater than 300',
      }),
    );
  });

  it('should keep the message of HTTP exceptions', () => {
    filter.catch(new NotFoundException('Cannot GET /api/nothing'), host);

    expect(status).toHaveBeenCalledWith(404);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({
        errorCode: 'NOT_FOUND',
        message: 'Cannot GET /api/nothing',
      }),
    );
  });

  it('should use a custom error code and details when given', () => {
    filter.catch(
      new ConflictException({
        errorCode: 'MUTEX_HELD',
        message: 'Already locked',
        details: { name: 'report' },
      }),
      host,
    );

    expect(json).toHaveBeenCalledWith({
      statusCode: 409,
      errorCode: 'MUTEX_HELD',
      message: 'Already locked',
      timestamp: expect.any(String),
      path: '/api/mutexes/report/try-lock',
      details: { name: 'report' },
    });
  });

  it('should hide unexpected errors behind a 500', () => {
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);

    filter.catch(new Error('secret internals'), host);

    expect(status).toHaveBeenCalledWith(500);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({
        errorCode: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      }),
    );
  });

  it('should answer 500 for non-error throwables', () => {
    filter.catch('nope', host);

    expect(status).toHaveBeenCalledWith(500);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({ errorCode: 'UNKNOWN_ERROR' }),
    );
  });
});
