// ─── Completion Provider ────────────────────────────────────────

/**
 * A text-generation service asked for one reply per inbound message.
 * Implementations throw `ProviderError` on any failure.
 */
export interface CompletionProvider {
  readonly id: string;
  readonly displayName: string;

  /** Send a single user-role message and return the generated text. */
  complete(prompt: string): Promise<string>;
}
