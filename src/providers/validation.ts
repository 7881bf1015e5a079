/**
 * API Key Lookup
 *
 * SECURITY: These functions NEVER log or return the key in messages.
 * They only report presence/absence.
 */

import { getEnv } from '../config/env.js';
import { APIKeyError } from '../errors/index.js';

export type KeyedProvider = 'anthropic' | 'openai';

const KEY_ENV_VARS = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
} as const satisfies Record<KeyedProvider, string>;

const DISPLAY_NAMES: Record<KeyedProvider, string> = {
  anthropic: 'Anthropic',
  openai: 'OpenAI',
};

/**
 * Get a provider's API key (trimmed).
 *
 * @throws APIKeyError if the key is unset or blank
 */
export function getProviderKey(provider: KeyedProvider): string {
  const envVar = KEY_ENV_VARS[provider];
  const key = getEnv(envVar)?.trim();
  if (!key) {
    throw new APIKeyError(DISPLAY_NAMES[provider], envVar);
  }
  return key;
}
