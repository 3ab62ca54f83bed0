import type { LogLevel } from '@/observability/types.js';

// ─── Enumerations ───────────────────────────────────────────────

/** Shape of the inbound event body accepted on the webhook route. */
export type InboundSchema = 'nested' | 'flat';

/** How the reply text is produced for an inbound message. */
export type ReplyPolicy = 'greeting' | 'echo' | 'completion';

// ─── Relay Configuration ────────────────────────────────────────

export interface ServerConfig {
  readonly port: number;
  readonly host: string;
  readonly webhookPath: string;
  readonly bodyLimitBytes: number;
}

export interface WhatsAppConfig {
  /** Bearer token for the send-message API. Empty means sends fail at call time. */
  readonly accessToken: string;
  readonly phoneNumberId: string;
  /** Shared secret for the verification handshake. Empty rejects every handshake. */
  readonly verifyToken: string;
  readonly apiVersion: string;
  readonly apiBaseUrl: string;
}

export interface ReplySettings {
  readonly inboundSchema: InboundSchema;
  readonly replyPolicy: ReplyPolicy;
  readonly greetingText: string;
  readonly echoPrefix: string;
  readonly fallbackText: string;
  readonly outboundTimeoutMs: number;
}

export interface CompletionConfig {
  readonly apiKey: string;
  readonly model: string;
  readonly maxOutputTokens: number;
  readonly baseUrl?: string;
}

/**
 * Process-wide configuration. Built once at start and frozen;
 * components receive it (or a slice of it) by parameter.
 */
export interface RelayConfig {
  readonly server: ServerConfig;
  readonly whatsapp: WhatsAppConfig;
  readonly relay: ReplySettings;
  readonly completion: CompletionConfig;
  readonly logLevel: LogLevel;
}
