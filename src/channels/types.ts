import type { Result } from '@/core/result.js';
import type { ValidationError } from '@/core/errors.js';

// ─── Channel Types ──────────────────────────────────────────────

export type ChannelType = 'whatsapp';

// ─── Inbound Message ────────────────────────────────────────────

/** First text message extracted from an inbound event. */
export interface InboundMessage {
  id: string;
  channel: ChannelType;
  channelMessageId?: string;

  /** Sender identifier (phone number / WhatsApp ID) */
  senderIdentifier: string;
  senderName?: string;

  /** Text body */
  content: string;

  /** Raw payload for debugging */
  rawPayload: unknown;
  receivedAt: Date;
}

// ─── Outbound Message ───────────────────────────────────────────

export interface OutboundMessage {
  channel: ChannelType;
  /** Recipient identifier (the sender of the triggering message) */
  recipientIdentifier: string;
  content: string;
}

// ─── Send Result ────────────────────────────────────────────────

export interface SendResult {
  success: boolean;
  channelMessageId?: string;
  error?: string;
}

// ─── Channel Adapter ────────────────────────────────────────────

export interface ChannelAdapter {
  readonly channelType: ChannelType;

  /** Send a message through this channel. Never rejects. */
  send(message: OutboundMessage): Promise<SendResult>;

  /**
   * Extract the first text message from a decoded webhook payload.
   * `null` means the event carries nothing to reply to.
   */
  parseInbound(payload: unknown): Result<InboundMessage | null, ValidationError>;

  /** Check if the channel API is reachable with the configured credentials */
  isHealthy(): Promise<boolean>;
}
