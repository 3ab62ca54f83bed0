/**
 * Relay assembly — builds the adapter, composer and relay from a config
 * and hands them to the HTTP server.
 */
import type { FastifyInstance } from 'fastify';
import { createServer } from '@/api/index.js';
import type { RouteDependencies } from '@/api/index.js';
import { createWhatsAppAdapter } from '@/channels/index.js';
import type { RelayConfig } from '@/config/index.js';
import type { Logger } from '@/observability/index.js';
import { createAnthropicProvider } from '@/providers/index.js';
import type { CompletionProvider } from '@/providers/index.js';
import { createMessageRelay, createReplyComposer } from '@/relay/index.js';

/** Wire every relay component for one configuration. */
export function createRelayDependencies(config: RelayConfig, logger: Logger): RouteDependencies {
  const channelAdapter = createWhatsAppAdapter({
    accessToken: config.whatsapp.accessToken,
    phoneNumberId: config.whatsapp.phoneNumberId,
    apiVersion: config.whatsapp.apiVersion,
    apiBaseUrl: config.whatsapp.apiBaseUrl,
    inboundSchema: config.relay.inboundSchema,
    timeoutMs: config.relay.outboundTimeoutMs,
    logger,
  });

  // Only the completion policy talks to the model API.
  let completionProvider: CompletionProvider | undefined;
  if (config.relay.replyPolicy === 'completion') {
    completionProvider = createAnthropicProvider({
      apiKey: config.completion.apiKey,
      model: config.completion.model,
      maxOutputTokens: config.completion.maxOutputTokens,
      timeoutMs: config.relay.outboundTimeoutMs,
      baseUrl: config.completion.baseUrl,
      logger,
    });
  }

  const composer = createReplyComposer({
    policy: config.relay.replyPolicy,
    greetingText: config.relay.greetingText,
    echoPrefix: config.relay.echoPrefix,
    fallbackText: config.relay.fallbackText,
    completionProvider,
    logger,
  });

  const messageRelay = createMessageRelay({ adapter: channelAdapter, composer, logger });

  return { config, channelAdapter, messageRelay, logger };
}

/** Build the complete relay server, ready to listen or inject. */
export async function createRelayApp(config: RelayConfig, logger: Logger): Promise<FastifyInstance> {
  return createServer(createRelayDependencies(config, logger));
}
