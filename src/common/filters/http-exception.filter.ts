import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ErrorResponse } from '../interfaces/base-response.interface';
import {
  InvalidMutexOptionsError,
  MutexStoreError,
} from '../../modules/mutex/errors';

interface ResolvedError {
  status: number;
  errorCode: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Global HTTP exception filter
 * Provides consistent error response format across the application
 *
 * Store failures become 503 so callers can tell "the coordination store is
 * down" apart from "someone else holds the lock" (a 200 with acquired=false).
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const { status, errorCode, message, details } = this.resolve(exception);

    const errorResponse: ErrorResponse = {
      statusCode: status,
      errorCode,
      message,
      timestamp: new Date().toISOString(),
      path: request.url,
      ...(details && { details }),
    };

    response.status(status).json(errorResponse);
  }

  private resolve(exception: unknown): ResolvedError {
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'string') {
        return {
          status,
          errorCode: this.getDefaultErrorCode(status),
          message: exceptionResponse,
        };
      }

      const body = new Map(Object.entries(exceptionResponse));
      const errorCode = body.get('errorCode');
      const message = body.get('message');
      const details = body.get('details');

      return {
        status,
        errorCode:
          typeof errorCode === 'string'
            ? errorCode
            : this.getDefaultErrorCode(status),
        message: this.toMessage(message) ?? exception.message,
        ...(this.isRecord(details) ? { details } : {}),
      };
    }

    if (exception instanceof MutexStoreError) {
      this.logger.error(exception.message);
      return {
        status: HttpStatus.SERVICE_UNAVAILABLE,
        errorCode: 'STORE_UNAVAILABLE',
        message: 'The mutex store is unavailable',
        details: { operation: exception.operation, key: exception.key },
      };
    }

    if (exception instanceof InvalidMutexOptionsError) {
      return {
        status: HttpStatus.BAD_REQUEST,
        errorCode: 'INVALID_MUTEX_OPTIONS',
        message: exception.message,
      };
    }

    if (exception instanceof Error) {
      // Log the actual error for debugging
      this.logger.error(
        `Unhandled exception: ${exception.message}`,
        exception.stack,
      );
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        errorCode: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      errorCode: 'UNKNOWN_ERROR',
      message: 'An unknown error occurred',
    };
  }

  /**
   * ValidationPipe reports a list of messages
   */
  private toMessage(value: unknown): string | undefined {
    if (typeof value === 'string') {
      return value;
    }
    if (Array.isArray(value)) {
      return value.map(String).join('; ');
    }
    return undefined;
  }

  private isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }

  private getDefaultErrorCode(status: number): string {
    const errorCodes: Record<number, string> = {
      400: 'BAD_REQUEST',
      404: 'NOT_FOUND',
      409: 'CONFLICT',
      422: 'UNPROCESSABLE_ENTITY',
      429: 'TOO_MANY_REQUESTS',
      500: 'INTERNAL_ERROR',
      503: 'SERVICE_UNAVAILABLE',
    };

    return errorCodes[status] || 'UNKNOWN_ERROR';
  }
}
