import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { createDbClient } from './client.js';
import type { Database } from './client.js';
import { ensureSchema } from './migrate.js';

/** Either a connection string, or an already-built database to decorate as-is. */
export type DbPluginOptions = { databaseUrl: string } | { db: Database };

/**
 * Fastify plugin that manages the Drizzle/postgres.js connection lifecycle.
 *
 * Creates the tables on first boot, decorates `fastify.db` for routes and
 * use cases, and closes the pool on server shutdown. A database passed in
 * directly is decorated untouched and its lifecycle stays with the caller.
 */
async function dbPlugin(fastify: FastifyInstance, options: DbPluginOptions): Promise<void> {
  if ('db' in options) {
    fastify.decorate('db', options.db);
    return;
  }

  const { sql, db } = createDbClient(options.databaseUrl);

  await ensureSchema(sql);
  fastify.log.info('Database ready (events + event_stats tables)');

  fastify.decorate('db', db);

  fastify.addHook('onClose', async () => {
    await sql.end();
    fastify.log.info('Database disconnected');
  });
}

export default fp(dbPlugin, {
  name: 'db',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.db` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    db: Database;
  }
}
