import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { EventRouter } from '../../application/event-router.js';

export interface RouterPluginOptions {
  router: EventRouter;
}

/**
 * Binds the event router's dispatch loop to the server lifecycle.
 *
 * The loop starts once every plugin has loaded and is stopped (and
 * awaited) when the server closes. Subscriber sockets are closed by the
 * WebSocket layer, not here.
 */
async function routerPlugin(fastify: FastifyInstance, options: RouterPluginOptions): Promise<void> {
  const { router } = options;

  fastify.decorate('eventRouter', router);

  fastify.addHook('onReady', async () => {
    router.start();
  });

  fastify.addHook('onClose', async () => {
    await router.stop();
  });
}

export default fp(routerPlugin, {
  name: 'event-router',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    eventRouter: EventRouter;
  }
}
