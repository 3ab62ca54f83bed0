import type { ChannelAdapter } from '@/channels/types.js';
import type { RelayConfig } from '@/config/types.js';
import type { Logger } from '@/observability/logger.js';
import type { MessageRelay } from '@/relay/message-relay.js';

// ─── API Response Envelope ───────────────────────────────────────

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// ─── Webhook Acknowledgement ────────────────────────────────────

/** Body returned to the platform for every POST delivery. */
export type WebhookAck =
  | { ok: true }
  | { ok: true; ignored: true; reason: 'no_message' }
  | { ok: false; error: string };

// ─── Route Dependencies (DI) ───────────────────────────────────

/** Dependencies injected into route plugins via Fastify register options. */
export interface RouteDependencies {
  config: RelayConfig;
  channelAdapter: ChannelAdapter;
  messageRelay: MessageRelay;
  logger: Logger;
}
