/**
 * Message Relay — composes a reply for one inbound message and sends it
 * back to the sender through the channel adapter.
 *
 * Send failures are logged and reported in the outcome; they never reach
 * the webhook caller, so the platform does not redeliver the event.
 */
import { nanoid } from 'nanoid';

import type { ChannelAdapter, InboundMessage, SendResult } from '@/channels/types.js';
import type { Logger } from '@/observability/logger.js';
import type { ReplyComposer } from './reply-policy.js';

// ─── Types ──────────────────────────────────────────────────────

export interface MessageRelayDeps {
  adapter: ChannelAdapter;
  composer: ReplyComposer;
  logger: Logger;
}

export interface RelayOutcome {
  relayId: string;
  reply: string;
  send: SendResult;
  durationMs: number;
}

export interface MessageRelay {
  /** Reply to a single inbound message. Never rejects. */
  relay(message: InboundMessage): Promise<RelayOutcome>;
}

// ─── Relay Factory ──────────────────────────────────────────────

export function createMessageRelay(deps: MessageRelayDeps): MessageRelay {
  const { adapter, composer, logger } = deps;

  return {
    async relay(message: InboundMessage): Promise<RelayOutcome> {
      const relayId = nanoid();
      const startTime = Date.now();

      logger.info('Received message', {
        component: 'message-relay',
        relayId,
        channel: message.channel,
        sender: message.senderIdentifier,
        messageId: message.channelMessageId,
      });

      const reply = await composer.compose(message);

      let send: SendResult;
      try {
        send = await adapter.send({
          channel: message.channel,
          recipientIdentifier: message.senderIdentifier,
          content: reply,
        });
      } catch (error) {
        send = {
          success: false,
          error: error instanceof Error ? error.message : 'Unknown error',
        };
      }

      const durationMs = Date.now() - startTime;

      if (send.success) {
        logger.info('Reply sent', {
          component: 'message-relay',
          relayId,
          policy: composer.policy,
          recipient: message.senderIdentifier,
          channelMessageId: send.channelMessageId,
          durationMs,
        });
      } else {
        logger.error('Failed to send reply', {
          component: 'message-relay',
          relayId,
          policy: composer.policy,
          recipient: message.senderIdentifier,
          error: send.error,
          durationMs,
        });
      }

      return { relayId, reply, send, durationMs };
    },
  };
}
