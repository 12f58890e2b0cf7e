import { NextResponse } from 'next/server';
import { logger } from './logger';
import { config } from './config';

/**
 * Standardized API response helpers
 * Ensures consistent response format across all endpoints
 *
 * Security:
 * - Never exposes stack traces
 * - Error details only in development with STRICT_ERROR_HANDLING=false
 * - Generates error IDs for correlation without exposing details
 */

export interface ApiSuccessResponse<T = unknown> {
  success: true;
  data: T;
}

export interface ApiErrorResponse {
  success: false;
  error: string;
  errorId?: string;
  details?: string;
}

export type ApiResponse<T = unknown> = ApiSuccessResponse<T> | ApiErrorResponse;

/**
 * Create a successful API response
 */
export function success<T>(data: T, status = 200): NextResponse<ApiSuccessResponse<T>> {
  return NextResponse.json({ success: true, data }, { status });
}

/**
 * Create an error API response
 * - Generates unique errorId for tracking
 * - Logs error details server-side
 * - Returns sanitized error to client
 */
export function error(
  message: string,
  status = 500,
  cause?: unknown
): NextResponse<ApiErrorResponse> {
  const errorId = crypto.randomUUID().slice(0, 8);
  const showDetails = config.isDev && !config.security.strictErrors;

  logger.error({
    errorId,
    message,
    status,
    cause: cause instanceof Error ? cause.message : cause === undefined ? undefined : String(cause),
    stack: cause instanceof Error ? cause.stack : undefined,
  }, `API Error [${errorId}]: ${message}`);

  const response: ApiErrorResponse = {
    success: false,
    error: message,
    errorId,
  };

  if (showDetails && cause) {
    response.details = cause instanceof Error ? cause.message : String(cause);
  }

  return NextResponse.json(response, { status });
}

/**
 * Common error responses
 */
export const errors = {
  badRequest: (message = 'Bad request', cause?: unknown) =>
    error(message, 400, cause),

  payloadTooLarge: (message = 'Payload too large') =>
    error(message, 413),

  internal: (message = 'Internal server error', cause?: unknown) =>
    error(message, 500, cause),

  serviceUnavailable: (message = 'Service unavailable', cause?: unknown) =>
    error(message, 503, cause),
};

/**
 * CSV download response
 */
export function csvFile(content: string, filename: string): NextResponse {
  return new NextResponse(content, {
    status: 200,
    headers: {
      'Content-Type': 'text/csv; charset=utf-8',
      'Content-Disposition': `attachment; filename="${filename}"`,
    },
  });
}
