import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { InboundMessage } from '@/channels/types.js';
import { createMockChannelAdapter, createMockLogger } from '@/testing/fixtures/routes.js';
import type { Logger } from '@/observability/logger.js';
import { createReplyComposer } from './reply-policy.js';
import type { ReplyComposer } from './reply-policy.js';
import { createMessageRelay } from './message-relay.js';

// ─── Fixtures ──────────────────────────────────────────────────

const message: InboundMessage = {
  id: 'wa-wamid.1',
  channel: 'whatsapp',
  channelMessageId: 'wamid.1',
  senderIdentifier: '15551234567',
  content: 'hi',
  rawPayload: {},
  receivedAt: new Date('2026-01-01T00:00:00Z'),
};

// ─── Tests ────────────────────────────────────────────────────

describe('createMessageRelay', () => {
  let adapter: ReturnType<typeof createMockChannelAdapter>;
  let logger: Logger;
  let composer: ReplyComposer;

  beforeEach(() => {
    adapter = createMockChannelAdapter();
    logger = createMockLogger();
    composer = createReplyComposer({
      policy: 'echo',
      greetingText: 'Welcome!',
      echoPrefix: 'Echo: ',
      fallbackText: 'Sorry.',
      logger,
    });
  });

  it('sends exactly one reply to the sender', async () => {
    const relay = createMessageRelay({ adapter, composer, logger });

    const outcome = await relay.relay(message);

    expect(adapter.send).toHaveBeenCalledTimes(1);
    expect(adapter.send).toHaveBeenCalledWith({
      channel: 'whatsapp',
      recipientIdentifier: '15551234567',
      content: 'Echo: hi',
    });
    expect(outcome.reply).toBe('Echo: hi');
    expect(outcome.send).toEqual({ success: true, channelMessageId: 'wamid.sent' });
    expect(outcome.relayId).toEqual(expect.any(String));
  });

  it('logs and reports a failed send without throwing', async () => {
    adapter.send.mockResolvedValue({ success: false, error: 'Invalid phone number' });
    const relay = createMessageRelay({ adapter, composer, logger });

    const outcome = await relay.relay(message);

    expect(outcome.send).toEqual({ success: false, error: 'Invalid phone number' });
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to send reply',
      expect.objectContaining({
        component: 'message-relay',
        relayId: outcome.relayId,
        recipient: '15551234567',
        error: 'Invalid phone number',
      }),
    );
  });

  it('turns a rejected send into a failed outcome', async () => {
    adapter.send.mockRejectedValue(new Error('socket hang up'));
    const relay = createMessageRelay({ adapter, composer, logger });

    const outcome = await relay.relay(message);

    expect(outcome.send).toEqual({ success: false, error: 'socket hang up' });
    expect(adapter.send).toHaveBeenCalledTimes(1);
  });

  it('uses a distinct relay id per message', async () => {
    const relay = createMessageRelay({ adapter, composer, logger });

    const first = await relay.relay(message);
    const second = await relay.relay(message);

    expect(first.relayId).not.toBe(second.relayId);
  });

  it('logs a successful send with the platform message id', async () => {
    const relay = createMessageRelay({ adapter, composer, logger });

    await relay.relay(message);

    expect(logger.info).toHaveBeenCalledWith(
      'Reply sent',
      expect.objectContaining({
        component: 'message-relay',
        policy: 'echo',
        channelMessageId: 'wamid.sent',
      }),
    );
    expect(vi.mocked(logger.error)).not.toHaveBeenCalled();
  });
});
