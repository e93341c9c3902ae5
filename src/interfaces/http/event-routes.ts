import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { AppConfig } from '../../config.js';
import { createEventSchema } from '../../application/event-schema.js';
import { publishEvent } from '../../application/publish-event.js';
import { EVENT_TYPES } from '../../domain/index.js';
import { createApiKeyGuard } from './auth-guard.js';

export interface EventRoutesOptions {
  config: AppConfig;
}

/**
 * Registers the event ingestion routes.
 *
 * POST /api/v1/events       — validate → persist → route live → 201
 * GET  /api/v1/event-types  — registry of accepted event types
 */
async function eventRoutes(fastify: FastifyInstance, options: EventRoutesOptions): Promise<void> {
  const { config } = options;
  const eventSchema = createEventSchema(config.payload);
  const requireAuth = createApiKeyGuard(config.auth);

  /**
   * The body is the stored event. `X-Event-Routed` reports separately
   * whether live subscribers will see it; `false` is not an error.
   */
  fastify.post(
    '/api/v1/events',
    {
      preHandler: requireAuth,
      config: { rateLimit: config.rateLimits.publish },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = eventSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const { event, routed } = await publishEvent(
        { db: fastify.db, router: fastify.eventRouter, log: request.log },
        parsed.data,
      );

      return reply
        .status(201)
        .header('x-event-routed', String(routed))
        .send(event);
    },
  );

  fastify.get('/api/v1/event-types', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send(EVENT_TYPES);
  });
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['db', 'event-router'],
  fastify: '5.x',
});
