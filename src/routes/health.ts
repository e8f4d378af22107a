import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { HealthStatus, ReadinessStatus } from '../types';
import { getCorrelationId, setCorrelationId } from '../utils/correlation-id';
import type { ConversionEngine } from '../engine';
import type { ConversionScheduler } from '../jobs';

export interface HealthRouteOptions {
  engine: ConversionEngine;
  scheduler: ConversionScheduler;
}

/**
 * Health check routes
 */
export async function healthRoutes(app: FastifyInstance, options: HealthRouteOptions): Promise<void> {
  /**
   * GET /healthz - Liveness probe
   * Always returns 200 if the service is running
   */
  app.get<{ Reply: HealthStatus }>('/healthz', async (request: FastifyRequest, reply: FastifyReply) => {
    const correlationId = getCorrelationId(request);
    setCorrelationId(reply, correlationId);
    return reply.code(200).send({ status: 'ok' });
  });

  /**
   * GET /readyz - Readiness probe
   * 200 when the engine answers its version check and the scheduler admits
   * work, 503 otherwise
   */
  app.get<{ Reply: ReadinessStatus }>('/readyz', async (request: FastifyRequest, reply: FastifyReply) => {
    const correlationId = getCorrelationId(request);
    setCorrelationId(reply, correlationId);

    const probe = await options.engine.probe();
    if (!probe.available) {
      request.log.warn({ correlationId, error: probe.error }, 'Engine probe failed');
    }

    const schedulerReady = options.scheduler.isAccepting();
    const status: ReadinessStatus = {
      ready: probe.available && schedulerReady,
      checks: {
        engine: probe.available,
        scheduler: schedulerReady,
      },
      engineVersion: probe.version,
    };

    return reply.code(status.ready ? 200 : 503).send(status);
  });
}
