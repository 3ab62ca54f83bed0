/**
 * WhatsApp webhook route — one path, two methods.
 *
 * GET  → verification handshake (200 + challenge, or 403)
 * POST → decode the event, relay the first text message, acknowledge
 *
 * Flow for POST:
 * 1. Read the whole body as text (any content type, size-limited)
 * 2. Decode JSON and extract the first message → 400 on malformed input
 * 3. No message → 200 no-op
 * 4. Compose + send the reply, then 200 whatever the send outcome
 *
 * Any other method on the path → 405.
 */
import type { FastifyInstance, FastifyReply, FastifyRequest, HTTPMethods } from 'fastify';
import { decodeInboundBody } from '@/channels/payload.js';
import { readVerificationQuery, verifySubscription } from '@/channels/verification.js';
import type { RouteDependencies, WebhookAck } from '../types.js';

const ALLOWED_METHODS = 'GET, POST';
const HANDLED_METHODS: readonly string[] = ['GET', 'HEAD', 'POST'];

/** Methods answered with 405: every method the server routes, minus the handled ones. */
function rejectedMethods(fastify: FastifyInstance): HTTPMethods[] {
  return fastify.supportedMethods.filter(
    (method): method is HTTPMethods => !HANDLED_METHODS.includes(method),
  );
}

// ─── Route Registration ─────────────────────────────────────────

/** Register the webhook routes. Must be registered as an encapsulated plugin. */
export async function whatsappWebhookRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): Promise<void> {
  const { config, channelAdapter, messageRelay, logger } = deps;
  const { webhookPath, bodyLimitBytes } = config.server;

  // Body stays raw text whatever the Content-Type; the handler decodes it.
  // A POST without Content-Type matches no parser, so give it a neutral one.
  fastify.addHook('onRequest', async (request) => {
    if (request.method === 'POST' && !request.headers['content-type']) {
      request.headers['content-type'] = 'application/octet-stream';
    }
  });
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser(
    '*',
    { parseAs: 'string', bodyLimit: bodyLimitBytes },
    (_request, body, done) => {
      done(null, body);
    },
  );

  // ─── GET — verification handshake ──────────────────────────────

  fastify.get(webhookPath, async (request: FastifyRequest, reply: FastifyReply) => {
    const verification = verifySubscription(
      readVerificationQuery(request.query),
      config.whatsapp.verifyToken,
    );

    if (verification.verified) {
      logger.info('WhatsApp webhook verified', { component: 'whatsapp-webhook' });
      return reply.status(200).type('text/plain; charset=utf-8').send(verification.challenge);
    }

    logger.warn('WhatsApp webhook verification failed', {
      component: 'whatsapp-webhook',
      reason: verification.reason,
    });
    return reply.status(403).type('text/plain; charset=utf-8').send('Forbidden');
  });

  // ─── POST — inbound events ─────────────────────────────────────

  fastify.post(webhookPath, async (request: FastifyRequest, reply: FastifyReply) => {
    const rawBody = typeof request.body === 'string' ? request.body : undefined;

    const decoded = decodeInboundBody(rawBody);
    if (!decoded.ok) {
      logger.warn('Rejected undecodable webhook body', {
        component: 'whatsapp-webhook',
        error: decoded.error.message,
      });
      const ack: WebhookAck = { ok: false, error: decoded.error.message };
      return reply.status(400).send(ack);
    }

    const parsed = channelAdapter.parseInbound(decoded.value);
    if (!parsed.ok) {
      logger.warn('Rejected webhook body with unexpected shape', {
        component: 'whatsapp-webhook',
        error: parsed.error.message,
        details: parsed.error.context,
      });
      const ack: WebhookAck = { ok: false, error: parsed.error.message };
      return reply.status(400).send(ack);
    }

    if (!parsed.value) {
      logger.debug('Webhook event carries no text message', { component: 'whatsapp-webhook' });
      const ack: WebhookAck = { ok: true, ignored: true, reason: 'no_message' };
      return reply.status(200).send(ack);
    }

    // 200 once decoded; send failures are only logged.
    await messageRelay.relay(parsed.value);

    const ack: WebhookAck = { ok: true };
    return reply.status(200).send(ack);
  });

  // ─── Anything else ─────────────────────────────────────────────

  fastify.route({
    method: rejectedMethods(fastify),
    url: webhookPath,
    handler: async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply
        .status(405)
        .header('Allow', ALLOWED_METHODS)
        .type('text/plain; charset=utf-8')
        .send('Method Not Allowed');
    },
  });
}
