import { ErrorCode } from './codes';
import { ErrorContext, ApiErrorResponse } from './types';
import type { JobErrorDetail } from '../types';

/**
 * Base error class for all service errors
 *
 * Provides structured error handling with:
 * - Error codes for programmatic handling
 * - HTTP status codes for API responses
 * - Retryable flag for the scheduler's retry policy
 * - Context for debugging and logging
 * - Serialization for API responses and terminal job records
 */
export abstract class ServiceError extends Error {
  /** Structured error code for programmatic handling */
  abstract readonly code: ErrorCode;

  /** HTTP status code to return */
  abstract readonly statusCode: number;

  /** Whether the scheduler may run the job again after this error */
  abstract readonly retryable: boolean;

  /** Additional context for debugging and logging */
  readonly context: ErrorContext;

  /** ISO 8601 timestamp when error occurred */
  readonly timestamp: string;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.timestamp = new Date().toISOString();

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error for API response
   *
   * @param correlationId - Request correlation ID for tracing
   */
  toApiResponse(correlationId: string): ApiErrorResponse {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      correlationId,
      timestamp: this.timestamp,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
    };
  }

  /**
   * Error detail stored on a terminal job
   */
  toJobError(): JobErrorDetail {
    return {
      code: this.code,
      error: this.name,
      message: this.message,
      retryable: this.retryable,
    };
  }
}
