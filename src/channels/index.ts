// Channel types, payload decoding and the WhatsApp adapter
export type {
  ChannelAdapter,
  ChannelType,
  InboundMessage,
  OutboundMessage,
  SendResult,
} from './types.js';

export type { FlatInboundEvent, NestedInboundEvent, WhatsAppMessageRecord } from './payload.js';
export { decodeInboundBody, extractFirstMessage } from './payload.js';

export type { VerificationRequest, VerificationResult } from './verification.js';
export { readVerificationQuery, verifySubscription } from './verification.js';

export type { WhatsAppAdapterConfig } from './adapters/whatsapp.js';
export { createWhatsAppAdapter } from './adapters/whatsapp.js';
