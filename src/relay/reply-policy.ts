/**
 * Reply composition — turns an inbound message into the reply text
 * according to the configured policy.
 */
import type { ReplyPolicy } from '@/config/types.js';
import type { InboundMessage } from '@/channels/types.js';
import type { Logger } from '@/observability/logger.js';
import type { CompletionProvider } from '@/providers/types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface ReplyComposerDeps {
  policy: ReplyPolicy;
  greetingText: string;
  echoPrefix: string;
  /** Used when the completion call fails or returns no text. */
  fallbackText: string;
  /** Required when `policy` is `completion`. */
  completionProvider?: CompletionProvider;
  logger: Logger;
}

export interface ReplyComposer {
  readonly policy: ReplyPolicy;

  /** Produce the reply body for a message. Never rejects. */
  compose(message: InboundMessage): Promise<string>;
}

// ─── Composer Factory ───────────────────────────────────────────

/**
 * Create a ReplyComposer for one of the three reply policies.
 *
 * @throws Error if the `completion` policy is chosen without a provider
 */
export function createReplyComposer(deps: ReplyComposerDeps): ReplyComposer {
  const { policy, greetingText, echoPrefix, fallbackText, completionProvider, logger } = deps;

  if (policy === 'completion' && !completionProvider) {
    throw new Error('The completion reply policy requires a completion provider');
  }

  const completeOrFallback = async (message: InboundMessage): Promise<string> => {
    if (!completionProvider) return fallbackText;

    try {
      const text = await completionProvider.complete(message.content);
      if (text.trim() === '') {
        logger.warn('Completion returned no text, using fallback reply', {
          component: 'reply-composer',
          provider: completionProvider.id,
          messageId: message.id,
        });
        return fallbackText;
      }
      return text;
    } catch (error) {
      logger.warn('Completion failed, using fallback reply', {
        component: 'reply-composer',
        provider: completionProvider.id,
        messageId: message.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return fallbackText;
    }
  };

  return {
    policy,

    compose(message: InboundMessage): Promise<string> {
      switch (policy) {
        case 'greeting':
          return Promise.resolve(greetingText);
        case 'echo':
          return Promise.resolve(`${echoPrefix}${message.content}`);
        case 'completion':
          return completeOrFallback(message);
      }
    },
  };
}
