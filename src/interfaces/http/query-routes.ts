import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { AppConfig } from '../../config.js';
import { eventQuerySchema, deleteEventsQuerySchema } from '../../application/event-schema.js';
import { listEvents, getEvent, clearEvents } from '../../application/query-events.js';
import { getPipelineStats } from '../../application/stats.js';
import { createApiKeyGuard } from './auth-guard.js';

export interface QueryRoutesOptions {
  config: AppConfig;
}

/**
 * History and admin routes over the durable store.
 *
 * GET    /api/v1/events            — filtered list, newest first
 * GET    /api/v1/events/:event_id  — single event
 * GET    /api/v1/stats             — store aggregates + router stats
 * DELETE /api/v1/events            — purge (admin)
 */
async function queryRoutes(fastify: FastifyInstance, options: QueryRoutesOptions): Promise<void> {
  const { config } = options;
  const requireAuth = createApiKeyGuard(config.auth);
  const requireAdmin = createApiKeyGuard(config.auth, 'admin');
  const queryLimit = { rateLimit: config.rateLimits.query };

  /**
   * Query params: event_type, session_id, user_id, since, limit
   */
  fastify.get(
    '/api/v1/events',
    { preHandler: requireAuth, config: queryLimit },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = eventQuerySchema.safeParse(request.query);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Invalid query parameters',
          issues: parsed.error.issues,
        });
      }

      const events = await listEvents(fastify.db, parsed.data);
      return reply.status(200).send(events);
    },
  );

  fastify.get<{ Params: { event_id: string } }>(
    '/api/v1/events/:event_id',
    { preHandler: requireAuth, config: queryLimit },
    async (
      request: FastifyRequest<{ Params: { event_id: string } }>,
      reply: FastifyReply,
    ) => {
      const event = await getEvent(fastify.db, request.params.event_id);

      if (event === null) {
        return reply.status(404).send({ error: 'Event not found' });
      }

      return reply.status(200).send(event);
    },
  );

  fastify.get(
    '/api/v1/stats',
    { preHandler: requireAuth, config: queryLimit },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const stats = await getPipelineStats(fastify.db, fastify.eventRouter);
      return reply.status(200).send(stats);
    },
  );

  /**
   * Query params: before (optional ISO-8601). Without it, everything goes.
   */
  fastify.delete(
    '/api/v1/events',
    { preHandler: requireAdmin, config: { rateLimit: config.rateLimits.admin } },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = deleteEventsQuerySchema.safeParse(request.query);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Invalid query parameters',
          issues: parsed.error.issues,
        });
      }

      const result = await clearEvents(fastify.db, parsed.data.before);
      request.log.info({ deleted: result.deleted, before: parsed.data.before ?? null }, 'Deleted events');

      return reply.status(200).send(result);
    },
  );
}

export default fp(queryRoutes, {
  name: 'query-routes',
  dependencies: ['db', 'event-router'],
  fastify: '5.x',
});
