/**
 * Zod schema for the environment variables the relay reads at start.
 * Empty strings are treated as unset so `.env` templates with blank
 * values fall back to the defaults.
 */
import { z } from 'zod';

// ─── Helpers ────────────────────────────────────────────────────

const emptyToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const stringVar = (fallback: string) =>
  z.preprocess(emptyToUndefined, z.string().default(fallback));

const intVar = (fallback: number, min: number, max: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));

// ─── Defaults ───────────────────────────────────────────────────

export const DEFAULT_PORT = 8080;
export const DEFAULT_WEBHOOK_PATH = '/webhook';
export const DEFAULT_GREETING_TEXT = 'Welcome to FeedMe - the first AI chat to feed you!';
export const DEFAULT_ECHO_PREFIX = 'You said: ';
export const DEFAULT_FALLBACK_TEXT = "Sorry, I couldn't come up with a reply right now.";
export const DEFAULT_OUTBOUND_TIMEOUT_MS = 10_000;
export const DEFAULT_COMPLETION_MODEL = 'claude-3-5-haiku-latest';

// ─── Environment Schema ─────────────────────────────────────────

export const relayEnvSchema = z.object({
  PORT: intVar(DEFAULT_PORT, 1, 65_535),
  HOST: stringVar('0.0.0.0'),
  WEBHOOK_PATH: z.preprocess(
    emptyToUndefined,
    z
      .string()
      .regex(/^\/\S*$/, 'Webhook path must start with "/" and contain no spaces')
      .default(DEFAULT_WEBHOOK_PATH),
  ),
  WEBHOOK_BODY_LIMIT: intVar(65_536, 1_024, 10_485_760),

  WHATSAPP_TOKEN: stringVar(''),
  WHATSAPP_PHONE_ID: stringVar(''),
  WHATSAPP_VERIFY_TOKEN: stringVar(''),
  WHATSAPP_API_VERSION: stringVar('v18.0'),
  WHATSAPP_API_BASE_URL: z.preprocess(
    emptyToUndefined,
    z.string().url('Invalid base URL format').default('https://graph.facebook.com'),
  ),

  INBOUND_SCHEMA: z.preprocess(emptyToUndefined, z.enum(['nested', 'flat']).default('nested')),
  REPLY_POLICY: z.preprocess(
    emptyToUndefined,
    z.enum(['greeting', 'echo', 'completion']).default('greeting'),
  ),
  GREETING_REPLY: stringVar(DEFAULT_GREETING_TEXT),
  ECHO_PREFIX: stringVar(DEFAULT_ECHO_PREFIX),
  COMPLETION_FALLBACK_REPLY: stringVar(DEFAULT_FALLBACK_TEXT),
  OUTBOUND_TIMEOUT_MS: intVar(DEFAULT_OUTBOUND_TIMEOUT_MS, 100, 120_000),

  ANTHROPIC_API_KEY: stringVar(''),
  ANTHROPIC_MODEL: stringVar(DEFAULT_COMPLETION_MODEL),
  COMPLETION_MAX_TOKENS: intVar(1024, 1, 64_000),
  ANTHROPIC_BASE_URL: z.preprocess(
    emptyToUndefined,
    z.string().url('Invalid base URL format').optional(),
  ),

  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  ),
});

export type RelayEnv = z.infer<typeof relayEnvSchema>;
