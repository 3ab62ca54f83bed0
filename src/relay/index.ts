// Reply composition and delivery
export type { ReplyComposer, ReplyComposerDeps } from './reply-policy.js';
export { createReplyComposer } from './reply-policy.js';

export type { MessageRelay, MessageRelayDeps, RelayOutcome } from './message-relay.js';
export { createMessageRelay } from './message-relay.js';
