import type { FastifyReply, FastifyRequest } from 'fastify';
import type { AppConfig } from '../../config.js';
import { apiKeyMatches, singleHeader } from '../auth.js';

/**
 * preHandler enforcing the `X-API-Key` header when auth is enabled.
 *
 * Admin routes use the same key today; they get their own guard instance
 * so the two can diverge without touching route definitions.
 */
export function createApiKeyGuard(auth: AppConfig['auth'], scope: 'client' | 'admin' = 'client') {
  return async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> => {
    if (!auth.required) return undefined;

    const provided = singleHeader(request.headers['x-api-key']);
    if (apiKeyMatches(provided, auth.apiKey)) return undefined;

    request.log.warn({ scope, url: request.url }, 'Rejected request with invalid API key');
    return reply.status(401).send({ error: 'Invalid or missing API key' });
  };
}
