/**
 * E2E tests for the relay: the assembled server with the real adapter,
 * composer and relay. Only the outbound HTTP and the model SDK are stubbed.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance, LightMyRequestResponse } from 'fastify';
import type { Mock } from 'vitest';
import { createRelayApp } from '@/app.js';
import {
  createTestConfig,
  TEST_ACCESS_TOKEN,
  TEST_PHONE_NUMBER_ID,
  TEST_VERIFY_TOKEN,
} from '@/testing/fixtures/config.js';
import { createMockLogger } from '@/testing/fixtures/routes.js';
import type { RelayConfig } from '@/config/types.js';

// ─── Mock Anthropic SDK ─────────────────────────────────────────

const { mockCreate } = vi.hoisted(() => ({ mockCreate: vi.fn() }));

vi.mock('@anthropic-ai/sdk', () => {
  class MockAnthropic {
    messages = { create: mockCreate };
    static APIError = class APIError extends Error {
      status: number | undefined;
      constructor(status: number | undefined, _error: unknown, message: string | undefined) {
        super(message);
        this.status = status;
      }
    };
  }
  return { default: MockAnthropic };
});

// ─── Helpers ────────────────────────────────────────────────────

const SEND_URL = `https://graph.facebook.com/v18.0/${TEST_PHONE_NUMBER_ID}/messages`;

const SCENARIO_BODY =
  '{"entry":[{"changes":[{"value":{"messages":[{"from":"15551234567","text":{"body":"hi"}}]}}]}]}';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

async function postEvent(app: FastifyInstance, payload: string): Promise<LightMyRequestResponse> {
  return app.inject({
    method: 'POST',
    url: '/webhook',
    headers: { 'content-type': 'application/json' },
    payload,
  });
}

interface SentRequest {
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

function sentRequests(fetchMock: Mock<typeof fetch>): SentRequest[] {
  return fetchMock.mock.calls.map(([input, init]) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    return {
      url: String(input),
      headers,
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    };
  });
}

// ─── Tests ──────────────────────────────────────────────────────

describe('WhatsApp webhook relay (e2e)', () => {
  let app: FastifyInstance;
  let fetchMock: Mock<typeof fetch>;

  const startApp = async (config: RelayConfig = createTestConfig()): Promise<void> => {
    app = await createRelayApp(config, createMockLogger());
    await app.ready();
  };

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({ messaging_product: 'whatsapp', messages: [{ id: 'wamid.reply' }] }),
    );
    vi.stubGlobal('fetch', fetchMock);
    mockCreate.mockReset();
  });

  afterEach(async () => {
    await app.close();
    vi.unstubAllGlobals();
  });

  describe('verification handshake', () => {
    it('completes a subscription handshake', async () => {
      await startApp();

      const response = await app.inject({
        method: 'GET',
        url: `/webhook?hub.mode=subscribe&hub.verify_token=${TEST_VERIFY_TOKEN}&hub.challenge=CHALLENGE_ACCEPTED`,
      });

      expect(response.statusCode).toBe(200);
      expect(response.body).toBe('CHALLENGE_ACCEPTED');
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('refuses a handshake with the wrong token', async () => {
      await startApp();

      const response = await app.inject({
        method: 'GET',
        url: '/webhook?hub.mode=subscribe&hub.verify_token=nope&hub.challenge=CHALLENGE_ACCEPTED',
      });

      expect(response.statusCode).toBe(403);
      expect(response.body).toBe('Forbidden');
    });
  });

  describe('greeting policy', () => {
    it('sends one greeting to the sender', async () => {
      await startApp();

      const response = await postEvent(app, SCENARIO_BODY);

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ ok: true });
      expect(sentRequests(fetchMock)).toEqual([
        {
          url: SEND_URL,
          headers: {
            'authorization': `Bearer ${TEST_ACCESS_TOKEN}`,
            'content-type': 'application/json',
          },
          body: {
            messaging_product: 'whatsapp',
            to: '15551234567',
            type: 'text',
            text: { body: 'Welcome!' },
          },
        },
      ]);
    });

    it('acknowledges with 200 when the platform rejects the send', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ error: { message: 'Invalid OAuth access token', code: 190 } }, 401),
      );
      await startApp();

      const response = await postEvent(app, SCENARIO_BODY);

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ ok: true });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('acknowledges with 200 when the platform is unreachable', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));
      await startApp();

      const response = await postEvent(app, SCENARIO_BODY);

      expect(response.statusCode).toBe(200);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('makes no call when credentials are missing', async () => {
      await startApp(createTestConfig({ whatsapp: { accessToken: '' } }));

      const response = await postEvent(app, SCENARIO_BODY);

      expect(response.statusCode).toBe(200);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('replies only to the first message of a batch', async () => {
      await startApp();

      const response = await postEvent(
        app,
        JSON.stringify({
          entry: [
            {
              changes: [
                {
                  value: {
                    messages: [
                      { from: '15550000001', text: { body: 'first' } },
                      { from: '15550000002', text: { body: 'second' } },
                    ],
                  },
                },
              ],
            },
          ],
        }),
      );

      expect(response.statusCode).toBe(200);
      const sent = sentRequests(fetchMock);
      expect(sent).toHaveLength(1);
      expect(sent[0]?.body).toMatchObject({ to: '15550000001' });
    });
  });

  describe('malformed and empty events', () => {
    it('returns 400 for malformed JSON and sends nothing', async () => {
      await startApp();

      const response = await postEvent(app, 'not json');

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ ok: false, error: 'Request body is not valid JSON' });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('returns 200 for an event without messages and sends nothing', async () => {
      await startApp();

      const response = await postEvent(app, '{"entry":[{"changes":[{"value":{}}]}]}');

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ ok: true, ignored: true, reason: 'no_message' });
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('echo policy with the flat schema', () => {
    it('echoes the text back with the prefix', async () => {
      await startApp(
        createTestConfig({ relay: { replyPolicy: 'echo', inboundSchema: 'flat', echoPrefix: 'Echo: ' } }),
      );

      const response = await postEvent(app, '{"messages":[{"from":"15551234567","text":{"body":"hi"}}]}');

      expect(response.statusCode).toBe(200);
      expect(sentRequests(fetchMock)[0]?.body).toEqual({
        messaging_product: 'whatsapp',
        to: '15551234567',
        type: 'text',
        text: { body: 'Echo: hi' },
      });
    });
  });

  describe('completion policy', () => {
    const completionConfig = (): RelayConfig => createTestConfig({ relay: { replyPolicy: 'completion' } });

    it('sends the model reply', async () => {
      mockCreate.mockResolvedValue({ content: [{ type: 'text', text: 'Hello there!' }] });
      await startApp(completionConfig());

      const response = await postEvent(app, SCENARIO_BODY);

      expect(response.statusCode).toBe(200);
      expect(mockCreate).toHaveBeenCalledWith({
        model: 'claude-test-model',
        max_tokens: 256,
        messages: [{ role: 'user', content: 'hi' }],
      });
      expect(sentRequests(fetchMock)[0]?.body).toMatchObject({ text: { body: 'Hello there!' } });
    });

    it('sends the fallback reply when the model call fails', async () => {
      mockCreate.mockRejectedValue(new Error('socket hang up'));
      await startApp(completionConfig());

      const response = await postEvent(app, SCENARIO_BODY);

      expect(response.statusCode).toBe(200);
      expect(sentRequests(fetchMock)[0]?.body).toMatchObject({
        text: { body: 'Sorry, try again later.' },
      });
    });

    it('sends the fallback reply when the model returns no text', async () => {
      mockCreate.mockResolvedValue({ content: [] });
      await startApp(completionConfig());

      await postEvent(app, SCENARIO_BODY);

      expect(sentRequests(fetchMock)[0]?.body).toMatchObject({
        text: { body: 'Sorry, try again later.' },
      });
    });
  });

  describe('health', () => {
    it('reports ok', async () => {
      await startApp();

      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'ok' });
    });
  });
});
