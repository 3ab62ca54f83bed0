/**
 * Inbound webhook payload decoding for the WhatsApp Cloud API.
 *
 * Two body shapes are accepted, chosen by configuration:
 * - `nested`: `entry[].changes[].value.messages[]` (current Cloud API)
 * - `flat`:   `messages[]` at the top level
 *
 * Only the first message of the first entry/change is relayed. Any empty
 * level yields `null`, which callers acknowledge without replying.
 */
import { nanoid } from 'nanoid';
import { z } from 'zod';

import type { InboundSchema } from '@/config/types.js';
import { ValidationError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { InboundMessage } from './types.js';

// ─── Schemas ────────────────────────────────────────────────────

// Absent or null fields are allowed at every level; only a wrong type is malformed.
const messageSchema = z.object({
  from: z.string().nullish(),
  id: z.string().nullish(),
  timestamp: z.string().nullish(),
  type: z.string().nullish(),
  text: z.object({ body: z.string().nullish() }).nullish(),
});

const contactSchema = z.object({
  wa_id: z.string().nullish(),
  profile: z.object({ name: z.string().nullish() }).nullish(),
});

const messagesContainerSchema = z.object({
  messages: z.array(messageSchema).nullish(),
  contacts: z.array(contactSchema).nullish(),
});

const nestedEventSchema = z.object({
  object: z.string().optional(),
  entry: z
    .array(
      z.object({
        id: z.string().optional(),
        changes: z
          .array(
            z.object({
              field: z.string().optional(),
              value: messagesContainerSchema.nullish(),
            }),
          )
          .nullish(),
      }),
    )
    .nullish(),
});

const flatEventSchema = messagesContainerSchema;

export type WhatsAppMessageRecord = z.infer<typeof messageSchema>;
export type NestedInboundEvent = z.infer<typeof nestedEventSchema>;
export type FlatInboundEvent = z.infer<typeof flatEventSchema>;
type MessagesContainer = z.infer<typeof messagesContainerSchema>;

// ─── Decoding ───────────────────────────────────────────────────

/** Decode a raw request body as JSON. Empty or malformed bodies are rejected. */
export function decodeInboundBody(
  raw: string | Buffer | undefined,
): Result<unknown, ValidationError> {
  const text = raw === undefined ? '' : raw.toString();
  if (text.trim() === '') {
    return err(new ValidationError('Request body is empty'));
  }

  try {
    return ok(JSON.parse(text));
  } catch (error) {
    return err(
      new ValidationError('Request body is not valid JSON', {
        reason: error instanceof Error ? error.message : String(error),
      }),
    );
  }
}

// ─── Extraction ─────────────────────────────────────────────────

function schemaError(schema: InboundSchema, error: z.ZodError): ValidationError {
  return new ValidationError('Payload does not match the webhook event schema', {
    schema,
    issues: error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  });
}

function firstContainer(
  payload: unknown,
  schema: InboundSchema,
): Result<MessagesContainer | null, ValidationError> {
  if (payload === null) return ok(null);

  if (schema === 'flat') {
    const parsed = flatEventSchema.safeParse(payload);
    return parsed.success ? ok(parsed.data) : err(schemaError(schema, parsed.error));
  }

  const parsed = nestedEventSchema.safeParse(payload);
  if (!parsed.success) return err(schemaError(schema, parsed.error));

  return ok(parsed.data.entry?.[0]?.changes?.[0]?.value ?? null);
}

function toReceivedAt(timestamp: string | null | undefined): Date {
  const seconds = Number(timestamp);
  return typeof timestamp === 'string' && Number.isFinite(seconds) ? new Date(seconds * 1000) : new Date();
}

/**
 * Extract the first text message from a decoded payload.
 *
 * Returns `err` when the payload has the wrong structure, `ok(null)` when
 * there is no text message to reply to (status updates, media, empty arrays).
 */
export function extractFirstMessage(
  payload: unknown,
  schema: InboundSchema,
): Result<InboundMessage | null, ValidationError> {
  const container = firstContainer(payload, schema);
  if (!container.ok) return container;

  const message = container.value?.messages?.[0];
  const sender = message?.from;
  const body = message?.text?.body;
  if (!message || !sender || typeof body !== 'string') return ok(null);
  if (message.type != null && message.type !== 'text') return ok(null);

  const contact = container.value?.contacts?.[0];

  return ok({
    id: `wa-${message.id ?? nanoid()}`,
    channel: 'whatsapp',
    channelMessageId: message.id ?? undefined,
    senderIdentifier: sender,
    senderName: contact?.profile?.name ?? undefined,
    content: body,
    rawPayload: payload,
    receivedAt: toReceivedAt(message.timestamp),
  });
}
