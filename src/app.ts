import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import type { AppConfig } from './config.js';
import { EventRouter } from './application/event-router.js';
import { dbPlugin, redisPlugin, routerPlugin } from './infrastructure/index.js';
import type { Database } from './infrastructure/index.js';
import { eventRoutes, healthRoutes, queryRoutes } from './interfaces/http/index.js';
import { EventSocketServer } from './interfaces/ws/index.js';

export interface BuildAppOptions {
  config: AppConfig;
  /** Defaults to a router sized from `config.router`. */
  router?: EventRouter;
  /** Skips the connection pool and schema setup when given. */
  db?: Database;
  /** Defaults to pino at `config.logLevel`. */
  logger?: boolean;
}

/**
 * Assembles the Fastify application without listening.
 *
 * Order:
 * 1) Security headers, CORS, rate limiting
 * 2) Infrastructure plugins (db, router lifecycle)
 * 3) HTTP routes
 * 4) WebSocket endpoints on the same server
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config } = options;

  const fastify = Fastify({
    logger: options.logger === false ? false : { level: config.logLevel },
  });

  // --------------------------------------------------
  // HTTP hardening
  // --------------------------------------------------

  await fastify.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
      },
    },
    xFrameOptions: { action: 'deny' },
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
  });

  await fastify.register(cors, {
    origin: config.corsOrigins.includes('*') ? '*' : config.corsOrigins,
    methods: ['GET', 'POST', 'DELETE'],
    allowedHeaders: ['Content-Type', 'X-API-Key'],
    credentials: false,
  });

  if (config.redisUrl !== null) {
    await fastify.register(redisPlugin, { redisUrl: config.redisUrl });
  }

  await fastify.register(rateLimit, {
    global: false,
    ...(config.redisUrl !== null ? { redis: fastify.redis } : {}),
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(dbPlugin, options.db ? { db: options.db } : { databaseUrl: config.databaseUrl });

  const router =
    options.router ??
    new EventRouter({
      maxQueueSize: config.router.maxQueueSize,
      maxSubscribers: config.router.maxSubscribers,
      log: fastify.log.child({ component: 'event-router' }),
    });

  await fastify.register(routerPlugin, { router });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(healthRoutes);
  await fastify.register(eventRoutes, { config });
  await fastify.register(queryRoutes, { config });

  // --------------------------------------------------
  // WebSocket Interface
  // --------------------------------------------------

  const sockets = new EventSocketServer({
    config,
    router,
    db: fastify.db,
    log: fastify.log.child({ component: 'ws' }),
  });
  sockets.attach(fastify.server);

  /** Sockets close before the router stops so subscribers see a clean 1001. */
  fastify.addHook('preClose', async () => {
    await sockets.close();
  });

  return fastify;
}
