/**
 * Anthropic completion provider.
 * Wraps the @anthropic-ai/sdk Messages API to implement CompletionProvider.
 */
import Anthropic from '@anthropic-ai/sdk';

import { ProviderError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import type { CompletionProvider } from './types.js';

/** Configuration for the Anthropic provider. */
export interface AnthropicProviderOptions {
  /** API key. Checked when the first completion is requested. */
  apiKey: string;
  /** Model identifier (e.g. 'claude-3-5-haiku-latest'). */
  model: string;
  maxOutputTokens: number;
  /** Per-request timeout; retries are disabled. */
  timeoutMs: number;
  /** Custom base URL (for proxies). */
  baseUrl?: string;
  logger: Logger;
}

/**
 * Concatenate every text block of a response, in order.
 * Other block types (tool use, thinking) are skipped.
 */
function extractText(content: Anthropic.Messages.ContentBlock[]): string {
  return content
    .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
    .map((block) => block.text)
    .join('');
}

/**
 * Anthropic provider implementing the CompletionProvider interface.
 */
export function createAnthropicProvider(options: AnthropicProviderOptions): CompletionProvider {
  const { logger } = options;
  let client: Anthropic | undefined;

  const getClient = (): Anthropic => {
    if (!options.apiKey) {
      throw new ProviderError('anthropic', 'Missing API key');
    }
    client ??= new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
      ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
    });
    return client;
  };

  return {
    id: `anthropic:${options.model}`,
    displayName: `Anthropic ${options.model}`,

    async complete(prompt: string): Promise<string> {
      const anthropic = getClient();

      logger.debug('Requesting Anthropic completion', {
        component: 'anthropic',
        model: options.model,
        promptLength: prompt.length,
      });

      try {
        const message = await anthropic.messages.create({
          model: options.model,
          max_tokens: options.maxOutputTokens,
          messages: [{ role: 'user', content: prompt }],
        });

        return extractText(message.content);
      } catch (error) {
        if (error instanceof Anthropic.APIError) {
          logger.error('Anthropic API error', {
            component: 'anthropic',
            status: error.status,
            errorMessage: error.message,
          });
          throw new ProviderError(
            'anthropic',
            `${error.status ?? 'connection'}: ${error.message}`,
            error,
          );
        }
        throw new ProviderError(
          'anthropic',
          error instanceof Error ? error.message : String(error),
          error instanceof Error ? error : undefined,
        );
      }
    },
  };
}
