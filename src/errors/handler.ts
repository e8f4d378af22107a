import { FastifyInstance, FastifyRequest, FastifyReply, FastifyError } from 'fastify';
import { ServiceError } from './base';
import { ErrorContext } from './types';
import {
  EngineCrashedError,
  EngineTimedOutError,
  EngineUnavailableError,
  InputTooLargeError,
  JobCancelledError,
  TemplateNotFoundError,
  TemplateMergeError,
  ValidationError,
  AuthenticationError,
  UnknownError,
} from './classes';
import { getCorrelationId, setCorrelationId } from '../utils/correlation-id';

interface ErrorLike {
  message: string;
  code?: unknown;
  statusCode?: unknown;
  validation?: unknown;
}

function toErrorLike(error: unknown): ErrorLike {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) };
  }
  return {
    message: 'message' in error && typeof error.message === 'string' ? error.message : String(error),
    code: 'code' in error ? error.code : undefined,
    statusCode: 'statusCode' in error ? error.statusCode : undefined,
    validation: 'validation' in error ? error.validation : undefined,
  };
}

/**
 * Check if error is a Fastify schema validation error or JSON parsing error
 */
function isFastifyValidationError(err: ErrorLike): boolean {
  if (err.validation !== undefined) return true;
  if (err.statusCode === 400) return true;
  if (typeof err.code === 'string' && err.code.startsWith('FST_ERR_CTP_')) return true;

  const message = err.message.toLowerCase();
  return message.includes('unexpected token') || (message.includes('json') && message.includes('parse'));
}

/**
 * Wrap an arbitrary thrown value in the matching ServiceError class
 *
 * Already-typed errors are returned as they are, with any missing context
 * keys filled in. Plain errors are classified by status code, errno and
 * message; `limits.maxBodyBytes` is reported for bodies Fastify refused.
 */
export function wrapError(error: unknown, context: ErrorContext = {}, limits: { maxBodyBytes?: number } = {}): ServiceError {
  if (error instanceof ServiceError) {
    for (const [key, value] of Object.entries(context)) {
      if (error.context[key] === undefined && value !== undefined) {
        error.context[key] = value;
      }
    }
    return error;
  }

  const err = toErrorLike(error);

  if (err.statusCode === 413 || err.code === 'FST_ERR_CTP_BODY_TOO_LARGE') {
    return new InputTooLargeError(limits.maxBodyBytes ?? 0, undefined, context);
  }

  // Handle Fastify schema validation errors (have 'validation' property or statusCode 400)
  if (isFastifyValidationError(err)) {
    return new ValidationError(err.message, context);
  }

  // Spawn failures carry the errno as a string code
  if (err.code === 'ENOENT' || err.code === 'EACCES') {
    return new EngineUnavailableError(err.message, context);
  }

  if (err.code === 'ABORT_ERR') {
    return new JobCancelledError('Job cancelled', context);
  }

  const message = err.message.toLowerCase();

  if (message.includes('template not found')) {
    return new TemplateNotFoundError(typeof context.templateId === 'string' ? context.templateId : 'unknown', context);
  }
  if (message.includes('merge failed')) {
    return new TemplateMergeError(err.message, context);
  }

  if (message.includes('timed out') || message.includes('timeout')) {
    const timeoutMatch = err.message.match(/(\d+)\s*ms/);
    return new EngineTimedOutError(timeoutMatch ? parseInt(timeoutMatch[1], 10) : 0, context);
  }
  if (message.includes('soffice') || message.includes('engine')) {
    return new EngineCrashedError(err.message, context);
  }

  if (message.includes('unauthorized') || message.includes('invalid token')) {
    return new AuthenticationError(err.message, context);
  }

  // Default to unknown error
  return new UnknownError(err.message, context);
}

export interface ErrorHandlerOptions {
  /** Body limit, reported when a request is rejected as too large */
  maxBodyBytes?: number;
}

/**
 * Create a Fastify error handler that uses ServiceError
 *
 * This handler:
 * 1. Extracts correlation ID from request
 * 2. Wraps plain errors in ServiceError
 * 3. Logs with full context
 * 4. Returns structured API response
 */
export function createErrorHandler(app: FastifyInstance, options: ErrorHandlerOptions = {}) {
  return (error: FastifyError | ServiceError | Error, request: FastifyRequest, reply: FastifyReply) => {
    const correlationId = getCorrelationId(request);
    setCorrelationId(reply, correlationId);

    const serviceError = wrapError(error, { correlationId }, { maxBodyBytes: options.maxBodyBytes });

    const log = serviceError.statusCode >= 500 ? app.log.error.bind(app.log) : app.log.warn.bind(app.log);
    log(
      {
        correlationId,
        code: serviceError.code,
        message: serviceError.message,
        statusCode: serviceError.statusCode,
        retryable: serviceError.retryable,
        context: serviceError.context,
      },
      'Request error'
    );

    return reply.status(serviceError.statusCode).send(serviceError.toApiResponse(correlationId));
  };
}
