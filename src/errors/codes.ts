/**
 * Structured error codes for programmatic error handling
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR
 *
 * Categories:
 * - ENGINE_*    : External rendering engine outcomes
 * - JOB_* / OVERLOADED : Scheduler and result delivery
 * - TEMPLATE_*  : Template lookup and merge
 * - VALIDATION_*: Request validation errors
 * - AUTH_*      : Authentication errors
 * - INTERNAL_*  : Internal server errors
 */
export enum ErrorCode {
  // Engine outcomes
  ENGINE_CRASHED = 'ENGINE_CRASHED',
  ENGINE_TIMED_OUT = 'ENGINE_TIMED_OUT',
  ENGINE_INVALID_OUTPUT = 'ENGINE_INVALID_OUTPUT',
  ENGINE_UNAVAILABLE = 'ENGINE_UNAVAILABLE',

  // Scheduling and delivery
  OVERLOADED = 'OVERLOADED',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  JOB_NOT_FOUND = 'JOB_NOT_FOUND',
  JOB_NOT_READY = 'JOB_NOT_READY',
  JOB_CANCELLED = 'JOB_CANCELLED',

  // Templates
  TEMPLATE_NOT_FOUND = 'TEMPLATE_NOT_FOUND',
  TEMPLATE_MERGE_ERROR = 'TEMPLATE_MERGE_ERROR',

  // Validation errors (4xx, non-retryable)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INPUT_TOO_LARGE = 'INPUT_TOO_LARGE',

  // Authentication
  AUTHENTICATION_ERROR = 'AUTHENTICATION_ERROR',

  // Configuration errors (500 - non-retryable)
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',

  // Internal errors (500 - non-retryable)
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}
