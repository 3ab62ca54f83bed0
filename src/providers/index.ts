// Completion providers
export type { CompletionProvider } from './types.js';
export type { AnthropicProviderOptions } from './anthropic.js';
export { createAnthropicProvider } from './anthropic.js';
