/**
 * Standard API response interface
 */
export interface BaseResponse<T = unknown> {
  success: boolean;
  data?: T;
  timestamp: string;
}

/**
 * Error response interface
 */
export interface ErrorResponse {
  statusCode: number;
  errorCode: string;
  message: string;
  timestamp: string;
  path: string;
  details?: Record<string, unknown>;
}
