/**
 * Custom Error Classes
 *
 * All errors extend BaseError and include:
 * - Error code for programmatic handling
 * - HTTP status code for API responses
 * - Timestamp for debugging
 * - Optional context for additional details
 */

export abstract class BaseError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
  }
}

// ==================
// VALIDATION ERRORS
// ==================

/**
 * Thrown when input validation fails (Zod, CSV mapping, etc.)
 */
export class ValidationError extends BaseError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly statusCode = 400;
  readonly field?: string;

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, context);
    this.field = field;
  }
}

/**
 * Thrown when a required setting (API key etc.) is missing
 */
export class ConfigurationError extends BaseError {
  readonly code = 'CONFIGURATION_ERROR' as const;
  readonly statusCode = 503;
  readonly setting: string;

  constructor(setting: string, message?: string) {
    super(message || `Missing configuration: ${setting}`, { setting });
    this.setting = setting;
  }
}

// ==================
// EXTERNAL SERVICE ERRORS
// ==================

export type TransportFailureKind = 'network' | 'timeout' | 'http' | 'malformed';

/**
 * A single verification request failed before a status could be read.
 * Returned as data by oracle clients; the probe loop skips the candidate.
 */
export class OracleTransportError extends BaseError {
  readonly code = 'ORACLE_TRANSPORT_ERROR' as const;
  readonly statusCode = 502;
  readonly provider: string;
  readonly kind: TransportFailureKind;
  readonly originalStatus?: number;

  constructor(
    provider: string,
    kind: TransportFailureKind,
    message: string,
    originalStatus?: number,
    context?: Record<string, unknown>
  ) {
    super(`${provider} ${kind} error: ${message}`, context);
    this.provider = provider;
    this.kind = kind;
    this.originalStatus = originalStatus;
  }
}

/**
 * Thrown when an operation exceeds its time budget
 */
export class TimeoutError extends BaseError {
  readonly code = 'TIMEOUT' as const;
  readonly statusCode = 504;
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message, { timeoutMs });
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Thrown when an upstream HTTP call returns a retryable status
 */
export class HttpStatusError extends BaseError {
  readonly code = 'HTTP_STATUS_ERROR' as const;
  readonly statusCode = 502;
  readonly status: number;

  constructor(status: number, statusText: string) {
    super(`HTTP ${status}: ${statusText}`, { status });
    this.status = status;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
