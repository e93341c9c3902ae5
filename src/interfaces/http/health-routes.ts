import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { VERSION } from '../../config.js';
import { pingDatabase } from '../../infrastructure/db/index.js';

/**
 * Liveness and readiness probes.
 *
 * GET /health     — process is up
 * GET /readiness  — database reachable; includes router stats
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ status: 'ok', service: 'event-pipeline', version: VERSION });
  });

  fastify.get('/readiness', async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      await pingDatabase(fastify.db);
      return reply.status(200).send({
        ready: true,
        database: 'connected',
        router: fastify.eventRouter.getStats(),
      });
    } catch (err: unknown) {
      fastify.log.error({ err }, 'Readiness check failed');
      return reply.status(503).send({ ready: false, database: 'disconnected' });
    }
  });
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['db', 'event-router'],
  fastify: '5.x',
});
