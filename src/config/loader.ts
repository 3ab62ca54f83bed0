/**
 * Configuration loader — validates the process environment with Zod and
 * maps it onto the frozen RelayConfig handed to every component.
 */
import { ConfigError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import { relayEnvSchema } from './schema.js';
import type { RelayEnv } from './schema.js';
import type { RelayConfig } from './types.js';

// ─── Mapping ────────────────────────────────────────────────────

function toRelayConfig(env: RelayEnv): RelayConfig {
  return Object.freeze({
    server: Object.freeze({
      port: env.PORT,
      host: env.HOST,
      webhookPath: env.WEBHOOK_PATH,
      bodyLimitBytes: env.WEBHOOK_BODY_LIMIT,
    }),
    whatsapp: Object.freeze({
      accessToken: env.WHATSAPP_TOKEN,
      phoneNumberId: env.WHATSAPP_PHONE_ID,
      verifyToken: env.WHATSAPP_VERIFY_TOKEN,
      apiVersion: env.WHATSAPP_API_VERSION,
      apiBaseUrl: env.WHATSAPP_API_BASE_URL.replace(/\/+$/, ''),
    }),
    relay: Object.freeze({
      inboundSchema: env.INBOUND_SCHEMA,
      replyPolicy: env.REPLY_POLICY,
      greetingText: env.GREETING_REPLY,
      echoPrefix: env.ECHO_PREFIX,
      fallbackText: env.COMPLETION_FALLBACK_REPLY,
      outboundTimeoutMs: env.OUTBOUND_TIMEOUT_MS,
    }),
    completion: Object.freeze({
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.ANTHROPIC_MODEL,
      maxOutputTokens: env.COMPLETION_MAX_TOKENS,
      ...(env.ANTHROPIC_BASE_URL ? { baseUrl: env.ANTHROPIC_BASE_URL } : {}),
    }),
    logLevel: env.LOG_LEVEL,
  });
}

// ─── Configuration Loader ───────────────────────────────────────

/**
 * Loads the relay configuration from environment variables.
 *
 * Secrets (tokens, API key) may be absent: the calls that need them fail
 * when they are made, not here. Malformed values (a non-numeric port, an
 * unknown reply policy) are rejected with every issue listed.
 */
export function loadRelayConfig(
  env: NodeJS.ProcessEnv = process.env,
): Result<RelayConfig, ConfigError> {
  const validation = relayEnvSchema.safeParse(env);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(new ConfigError('Configuration validation failed', { issues }));
  }

  return ok(toRelayConfig(validation.data));
}
