/**
 * Error Handling Module
 *
 * Provides structured error handling with:
 * - Error codes for programmatic handling
 * - HTTP status codes for API responses
 * - Retryable flag for the scheduler's retry policy
 * - Terminal job error details
 *
 * Usage:
 *
 * ```typescript
 * import { EngineCrashedError, wrapError, ErrorCode } from './errors';
 *
 * // Throw a typed error
 * throw new EngineCrashedError('exit code 81', { jobId, correlationId });
 *
 * // Classify anything that was thrown
 * const serviceError = wrapError(error, { jobId });
 * ```
 */

// Error codes enum
export { ErrorCode } from './codes';

// Types and interfaces
export type { ErrorContext, ApiErrorResponse } from './types';

// Base error class
export { ServiceError } from './base';

// All specialized error classes
export {
  // Engine errors
  EngineCrashedError,
  EngineTimedOutError,
  EngineInvalidOutputError,
  EngineUnavailableError,
  // Scheduling and delivery errors
  OverloadedError,
  ServiceUnavailableError,
  JobNotFoundError,
  JobNotReadyError,
  JobCancelledError,
  // Template errors
  TemplateNotFoundError,
  TemplateMergeError,
  // Validation errors
  ValidationError,
  InputTooLargeError,
  // Authentication errors
  AuthenticationError,
  // Configuration errors
  ConfigurationError,
  // Internal errors
  InternalError,
  UnknownError,
} from './classes';

// Handler utilities
export { wrapError, createErrorHandler } from './handler';
export type { ErrorHandlerOptions } from './handler';
