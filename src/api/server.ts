/**
 * HTTP server assembly — plugins, error handler, health check and the
 * webhook routes. Listening is left to the caller.
 */
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import { registerErrorHandler } from './error-handler.js';
import { whatsappWebhookRoutes } from './routes/whatsapp-webhook.js';
import type { RouteDependencies } from './types.js';

/** Build a ready-to-listen Fastify instance. */
export async function createServer(deps: RouteDependencies): Promise<FastifyInstance> {
  const server = Fastify({
    logger: false,
  });

  await server.register(helmet);
  registerErrorHandler(server, deps.logger);

  server.get('/health', () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  await server.register(whatsappWebhookRoutes, deps);

  return server;
}
