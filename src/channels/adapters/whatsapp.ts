/**
 * WhatsApp Channel Adapter — sends/receives messages via WhatsApp Cloud API.
 */
import { z } from 'zod';

import type { InboundSchema } from '@/config/types.js';
import type { Logger } from '@/observability/logger.js';
import { extractFirstMessage } from '../payload.js';
import type { ChannelAdapter, OutboundMessage, SendResult } from '../types.js';

// ─── Config ─────────────────────────────────────────────────────

export interface WhatsAppAdapterConfig {
  /** Bearer token for the Graph API. Empty fails each send without a request. */
  accessToken: string;
  /** WhatsApp Business Phone Number ID */
  phoneNumberId: string;
  /** API version (default: v18.0) */
  apiVersion?: string;
  /** Graph API origin (default: https://graph.facebook.com) */
  apiBaseUrl?: string;
  /** Accepted inbound body shape (default: nested) */
  inboundSchema?: InboundSchema;
  /** Abort outbound requests after this many milliseconds */
  timeoutMs: number;
  logger: Logger;
}

// ─── WhatsApp API Types ─────────────────────────────────────────

const sendResponseSchema = z.object({
  messaging_product: z.string().optional(),
  contacts: z.array(z.object({ wa_id: z.string() })).optional(),
  messages: z.array(z.object({ id: z.string() })).optional(),
  error: z
    .object({
      message: z.string(),
      type: z.string().optional(),
      code: z.number().optional(),
    })
    .optional(),
});

type WhatsAppSendResponse = z.infer<typeof sendResponseSchema>;

function parseSendResponse(body: string): WhatsAppSendResponse {
  try {
    const parsed = sendResponseSchema.safeParse(JSON.parse(body));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

function describeFailure(error: unknown, timeoutMs: number): string {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return `Request timed out after ${timeoutMs}ms`;
  }
  return error instanceof Error ? error.message : 'Unknown error';
}

// ─── Adapter Factory ────────────────────────────────────────────

/**
 * Create a WhatsApp Cloud API channel adapter.
 */
export function createWhatsAppAdapter(config: WhatsAppAdapterConfig): ChannelAdapter {
  const { logger, timeoutMs } = config;
  const apiVersion = config.apiVersion ?? 'v18.0';
  const apiBaseUrl = config.apiBaseUrl ?? 'https://graph.facebook.com';
  const inboundSchema = config.inboundSchema ?? 'nested';
  const baseUrl = `${apiBaseUrl}/${apiVersion}/${config.phoneNumberId}`;

  const missingCredential = (): string | undefined => {
    if (!config.accessToken) return 'Missing WhatsApp access token';
    if (!config.phoneNumberId) return 'Missing WhatsApp phone number ID';
    return undefined;
  };

  return {
    channelType: 'whatsapp',

    async send(message: OutboundMessage): Promise<SendResult> {
      const credentialError = missingCredential();
      if (credentialError) {
        return { success: false, error: credentialError };
      }

      try {
        const body = {
          messaging_product: 'whatsapp',
          to: message.recipientIdentifier,
          type: 'text',
          text: {
            body: message.content,
          },
        };

        const response = await fetch(`${baseUrl}/messages`, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'Authorization': `Bearer ${config.accessToken}`,
          },
          body: JSON.stringify(body),
          signal: AbortSignal.timeout(timeoutMs),
        });

        const responseBody = await response.text();
        logger.debug('WhatsApp API response', {
          component: 'whatsapp-adapter',
          status: response.status,
          body: responseBody,
        });

        const data = parseSendResponse(responseBody);

        if (!response.ok) {
          return {
            success: false,
            error: data.error?.message ?? `HTTP ${response.status}`,
          };
        }

        return {
          success: true,
          channelMessageId: data.messages?.[0]?.id,
        };
      } catch (error) {
        return {
          success: false,
          error: describeFailure(error, timeoutMs),
        };
      }
    },

    parseInbound(payload: unknown) {
      return extractFirstMessage(payload, inboundSchema);
    },

    async isHealthy(): Promise<boolean> {
      if (missingCredential()) return false;

      try {
        const response = await fetch(baseUrl, {
          headers: {
            'Authorization': `Bearer ${config.accessToken}`,
          },
          signal: AbortSignal.timeout(timeoutMs),
        });
        return response.ok;
      } catch {
        return false;
      }
    },
  };
}
