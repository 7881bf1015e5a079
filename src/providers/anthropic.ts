/**
 * Anthropic Claude LLM Provider
 *
 * SECURITY: The API key is read only when the provider is created and is
 * never logged or placed in error messages.
 */

import { createAnthropic } from '@ai-sdk/anthropic';
import type { LanguageModel } from 'ai';
import { getProviderKey } from './validation.js';

export interface AnthropicProviderOptions {
  /**
   * Model to use for completions.
   * @default 'claude-sonnet-4-20250514'
   */
  model?: string;
}

export interface AnthropicProviderResult {
  provider: LanguageModel;
  name: 'anthropic';
  model: string;
}

/** Default model for Anthropic - Claude Sonnet 4 */
export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-20250514';

/**
 * Create a Claude language model.
 *
 * @throws APIKeyError if ANTHROPIC_API_KEY is not set
 *
 * @example
 * ```typescript
 * const { provider, model } = createAnthropicProvider({ model: 'claude-3-5-haiku-latest' });
 * ```
 */
export function createAnthropicProvider(options: AnthropicProviderOptions = {}): AnthropicProviderResult {
  const model = options.model ?? DEFAULT_ANTHROPIC_MODEL;
  const anthropic = createAnthropic({ apiKey: getProviderKey('anthropic') });
  return { provider: anthropic(model), name: 'anthropic', model };
}
