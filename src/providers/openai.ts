/**
 * OpenAI LLM Provider
 *
 * SECURITY: The API key is read only when the provider is created and is
 * never logged or placed in error messages.
 */

import { createOpenAI } from '@ai-sdk/openai';
import type { LanguageModel } from 'ai';
import { getProviderKey } from './validation.js';

export interface OpenAIProviderOptions {
  /**
   * Model to use for completions.
   * @default 'gpt-4o'
   */
  model?: string;
}

export interface OpenAIProviderResult {
  provider: LanguageModel;
  name: 'openai';
  model: string;
}

export const DEFAULT_OPENAI_MODEL = 'gpt-4o';

/**
 * Create an OpenAI chat model.
 *
 * @throws APIKeyError if OPENAI_API_KEY is not set
 */
export function createOpenAIProvider(options: OpenAIProviderOptions = {}): OpenAIProviderResult {
  const model = options.model ?? DEFAULT_OPENAI_MODEL;
  const openai = createOpenAI({ apiKey: getProviderKey('openai') });
  return { provider: openai.chat(model), name: 'openai', model };
}
