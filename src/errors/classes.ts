import { ErrorCode } from './codes';
import { ErrorContext } from './types';
import { ServiceError } from './base';

// =============================================================================
// Engine Errors (outcomes of one engine invocation)
// =============================================================================

/**
 * Engine exited abnormally (nonzero exit, killed by a signal, or no output)
 *
 * Often transient (corrupt profile, stale lock file); retried once.
 */
export class EngineCrashedError extends ServiceError {
  readonly code = ErrorCode.ENGINE_CRASHED;
  readonly statusCode = 502;
  readonly retryable = true;

  constructor(message: string, context: ErrorContext = {}) {
    super(`Engine crashed: ${message}`, context);
  }
}

/**
 * Engine exceeded its time budget and was killed
 */
export class EngineTimedOutError extends ServiceError {
  readonly code = ErrorCode.ENGINE_TIMED_OUT;
  readonly statusCode = 504;
  readonly retryable = false;

  constructor(timeoutMs: number, context: ErrorContext = {}) {
    super(`Engine timed out after ${timeoutMs}ms`, { ...context, duration: timeoutMs });
  }
}

/**
 * Engine finished but its output is empty or not of the target format
 */
export class EngineInvalidOutputError extends ServiceError {
  readonly code = ErrorCode.ENGINE_INVALID_OUTPUT;
  readonly statusCode = 502;
  readonly retryable = false;

  constructor(message: string, context: ErrorContext = {}) {
    super(`Engine produced invalid output: ${message}`, context);
  }
}

/**
 * Engine binary missing or not startable
 */
export class EngineUnavailableError extends ServiceError {
  readonly code = ErrorCode.ENGINE_UNAVAILABLE;
  readonly statusCode = 503;
  readonly retryable = false;

  constructor(message: string, context: ErrorContext = {}) {
    super(`Engine unavailable: ${message}`, context);
  }
}

// =============================================================================
// Scheduling and Delivery Errors
// =============================================================================

/**
 * Every slot is busy and the queue is full
 */
export class OverloadedError extends ServiceError {
  readonly code = ErrorCode.OVERLOADED;
  readonly statusCode = 429;
  readonly retryable = true;

  constructor(context: ErrorContext = {}) {
    super('Conversion queue is full, retry later', context);
  }
}

/**
 * Scheduler no longer admits work (shutting down)
 */
export class ServiceUnavailableError extends ServiceError {
  readonly code = ErrorCode.SERVICE_UNAVAILABLE;
  readonly statusCode = 503;
  readonly retryable = true;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
  }
}

/**
 * Job id unknown or already expired
 */
export class JobNotFoundError extends ServiceError {
  readonly code = ErrorCode.JOB_NOT_FOUND;
  readonly statusCode = 404;
  readonly retryable = false;

  constructor(jobId: string, context: ErrorContext = {}) {
    super(`Job not found: ${jobId}`, { ...context, jobId });
  }
}

/**
 * Job has no artifact to deliver (still active, or did not succeed)
 */
export class JobNotReadyError extends ServiceError {
  readonly code = ErrorCode.JOB_NOT_READY;
  readonly statusCode = 409;
  readonly retryable = true;

  constructor(jobId: string, state: string, context: ErrorContext = {}) {
    super(`Job ${jobId} has no artifact (state: ${state})`, { ...context, jobId, state });
  }
}

/**
 * Job was cancelled before it finished
 */
export class JobCancelledError extends ServiceError {
  readonly code = ErrorCode.JOB_CANCELLED;
  readonly statusCode = 409;
  readonly retryable = false;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
  }
}

// =============================================================================
// Template Errors (4xx - Client errors, non-retryable)
// =============================================================================

/**
 * Template id does not resolve to a stored template
 */
export class TemplateNotFoundError extends ServiceError {
  readonly code = ErrorCode.TEMPLATE_NOT_FOUND;
  readonly statusCode = 404;
  readonly retryable = false;

  constructor(templateId: string, context: ErrorContext = {}) {
    super(`Template not found: ${templateId}`, { ...context, templateId });
  }
}

/**
 * Template merge failed (invalid placeholders, bad data, not a DOCX, etc.)
 */
export class TemplateMergeError extends ServiceError {
  readonly code = ErrorCode.TEMPLATE_MERGE_ERROR;
  readonly statusCode = 400;
  readonly retryable = false;

  constructor(message: string, context: ErrorContext = {}) {
    super(`Template merge failed: ${message}`, context);
  }
}

// =============================================================================
// Validation Errors (400 - Bad Request, non-retryable)
// =============================================================================

/**
 * Request validation failed
 */
export class ValidationError extends ServiceError {
  readonly code = ErrorCode.VALIDATION_ERROR;
  readonly statusCode = 400;
  readonly retryable = false;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
  }
}

/**
 * Input document exceeds the configured size limit
 */
export class InputTooLargeError extends ServiceError {
  readonly code = ErrorCode.INPUT_TOO_LARGE;
  readonly statusCode = 413;
  readonly retryable = false;

  constructor(maxBytes: number, sizeBytes?: number, context: ErrorContext = {}) {
    super(
      sizeBytes === undefined
        ? `Request body exceeds maximum allowed size (${maxBytes} bytes)`
        : `Input size (${sizeBytes} bytes) exceeds maximum allowed size (${maxBytes} bytes)`,
      { ...context, sizeBytes, maxBytes }
    );
  }
}

// =============================================================================
// Authentication Errors (401 - non-retryable)
// =============================================================================

/**
 * Authentication failed (invalid or missing token)
 */
export class AuthenticationError extends ServiceError {
  readonly code = ErrorCode.AUTHENTICATION_ERROR;
  readonly statusCode = 401;
  readonly retryable = false;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
  }
}

// =============================================================================
// Configuration Errors (500 - non-retryable)
// =============================================================================

/**
 * Configuration error
 */
export class ConfigurationError extends ServiceError {
  readonly code = ErrorCode.CONFIGURATION_ERROR;
  readonly statusCode = 500;
  readonly retryable = false;

  constructor(message: string, context: ErrorContext = {}) {
    super(`Configuration error: ${message}`, context);
  }
}

// =============================================================================
// Internal Errors (500 - non-retryable)
// =============================================================================

/**
 * Internal server error
 */
export class InternalError extends ServiceError {
  readonly code = ErrorCode.INTERNAL_ERROR;
  readonly statusCode = 500;
  readonly retryable = false;

  constructor(message: string, context: ErrorContext = {}) {
    super(`Internal error: ${message}`, context);
  }
}

/**
 * Unknown/unclassified error (fallback)
 */
export class UnknownError extends ServiceError {
  readonly code = ErrorCode.UNKNOWN_ERROR;
  readonly statusCode = 500;
  readonly retryable = false;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
  }
}
