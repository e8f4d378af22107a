import { ErrorCode } from './codes';

/**
 * Context information attached to errors for debugging and logging
 */
export interface ErrorContext {
  /** Conversion job id */
  jobId?: string;
  /** Template id from the request */
  templateId?: string;
  /** Request correlation ID for distributed tracing */
  correlationId?: string;
  /** Target format of the conversion */
  targetFormat?: string;
  /** Input size in bytes */
  sizeBytes?: number;
  /** Processing duration in milliseconds */
  duration?: number;
  /** Engine attempt number */
  attempt?: number;
  /** Engine process exit code */
  exitCode?: number | null;
  /** Signal that ended the engine process */
  signal?: string | null;
  /** Tail of the engine's stderr */
  stderr?: string;
  /** Allow additional context fields */
  [key: string]: unknown;
}

/**
 * Structured error response returned by the API
 */
export interface ApiErrorResponse {
  /** Error class name (e.g., "OverloadedError") */
  error: string;
  /** Structured error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable error message */
  message: string;
  /** HTTP status code */
  statusCode: number;
  /** Request correlation ID */
  correlationId: string;
  /** ISO 8601 timestamp when error occurred */
  timestamp: string;
  /** Additional context for debugging */
  context?: ErrorContext;
}
