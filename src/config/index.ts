// ─── Types ──────────────────────────────────────────────────────
export type {
  CompletionConfig,
  InboundSchema,
  RelayConfig,
  ReplyPolicy,
  ReplySettings,
  ServerConfig,
  WhatsAppConfig,
} from './types.js';
export type { RelayEnv } from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export { loadRelayConfig } from './loader.js';
