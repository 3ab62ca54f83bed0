// HTTP endpoints (Fastify)
export type { ApiError, ApiResponse, RouteDependencies, WebhookAck } from './types.js';

export { registerErrorHandler, sendError } from './error-handler.js';
export { whatsappWebhookRoutes } from './routes/whatsapp-webhook.js';
export { createServer } from './server.js';
