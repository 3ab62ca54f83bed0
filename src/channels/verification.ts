/**
 * Webhook verification handshake.
 *
 * The platform confirms endpoint ownership with a GET carrying
 * `hub.mode`, `hub.verify_token` and `hub.challenge`; the endpoint proves
 * it knows the shared secret by echoing the challenge back.
 */
import { z } from 'zod';

// ─── Types ──────────────────────────────────────────────────────

export interface VerificationRequest {
  mode?: string;
  token?: string;
  challenge?: string;
}

export type VerificationFailureReason = 'not_configured' | 'mode_mismatch' | 'token_mismatch';

export type VerificationResult =
  | { readonly verified: true; readonly challenge: string }
  | { readonly verified: false; readonly reason: VerificationFailureReason };

// ─── Query Parsing ──────────────────────────────────────────────

/** A repeated query parameter arrives as an array; the first value wins. */
const queryParamSchema = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => (Array.isArray(value) ? value[0] : value));

const verificationQuerySchema = z.object({
  'hub.mode': queryParamSchema,
  'hub.verify_token': queryParamSchema,
  'hub.challenge': queryParamSchema,
});

/** Read the three handshake parameters from a parsed query string. */
export function readVerificationQuery(query: unknown): VerificationRequest {
  const parsed = verificationQuerySchema.safeParse(query);
  if (!parsed.success) return {};

  return {
    mode: parsed.data['hub.mode'],
    token: parsed.data['hub.verify_token'],
    challenge: parsed.data['hub.challenge'],
  };
}

// ─── Verification ───────────────────────────────────────────────

const SUBSCRIBE_MODE = 'subscribe';

/**
 * Evaluate a handshake against the configured secret.
 * Plain string equality; an empty secret never verifies.
 */
export function verifySubscription(
  request: VerificationRequest,
  verifyToken: string,
): VerificationResult {
  if (verifyToken === '') {
    return { verified: false, reason: 'not_configured' };
  }
  if (request.mode !== SUBSCRIBE_MODE) {
    return { verified: false, reason: 'mode_mismatch' };
  }
  if (request.token !== verifyToken) {
    return { verified: false, reason: 'token_mismatch' };
  }
  return { verified: true, challenge: request.challenge ?? '' };
}
