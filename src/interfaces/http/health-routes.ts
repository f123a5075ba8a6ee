import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply } from 'fastify';

/**
 * Health and metrics routes.
 *
 * GET /healthz — liveness probe.
 * GET /metrics — message pipeline counters.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get('/healthz', async (_request, reply: FastifyReply) => {
    return reply.status(200).send({ status: 'ok' });
  });

  fastify.get('/metrics', async (_request, reply: FastifyReply) => {
    return reply.status(200).send(fastify.stats.snapshot());
  });
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['stats'],
  fastify: '5.x',
});
