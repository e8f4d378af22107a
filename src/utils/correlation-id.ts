import { v4 as uuidv4 } from 'uuid';
import { FastifyRequest, FastifyReply } from 'fastify';

export const CORRELATION_HEADER = 'x-correlation-id';

// Caller-supplied ids are echoed into logs and headers
const VALID_ID = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Generate a new correlation ID
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Extract or generate correlation ID from request
 */
export function getCorrelationId(request: FastifyRequest): string {
  const headerValue = request.headers[CORRELATION_HEADER];
  const candidate = Array.isArray(headerValue) ? headerValue[0] : headerValue;

  if (typeof candidate === 'string' && VALID_ID.test(candidate)) {
    return candidate;
  }

  return generateCorrelationId();
}

/**
 * Add correlation ID to response headers
 */
export function setCorrelationId(reply: FastifyReply, correlationId: string): void {
  reply.header(CORRELATION_HEADER, correlationId);
}
