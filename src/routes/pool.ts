import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { getCorrelationId, setCorrelationId } from '../utils/correlation-id';
import type { ConversionScheduler, ResultStore } from '../jobs';

export interface PoolRouteOptions {
  scheduler: ConversionScheduler;
  store: ResultStore;
}

/**
 * Pool monitoring routes
 *
 * Statistics are per process; behind a load balancer each replica reports
 * its own pool.
 */
export async function poolRoutes(fastify: FastifyInstance, options: PoolRouteOptions): Promise<void> {
  /**
   * GET /pool/stats
   */
  fastify.get(
    '/stats',
    {
      preHandler: [fastify.authenticate],
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const correlationId = getCorrelationId(request);
      setCorrelationId(reply, correlationId);

      return reply.code(200).send({
        scheduler: options.scheduler.getStats(),
        results: options.store.getStats(),
        correlationId,
      });
    }
  );
}
