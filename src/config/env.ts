/**
 * Environment Variable Handler
 *
 * Loads provider API keys (with .env support via dotenv) and the
 * DOCENT_HOME override. Keys are never logged or placed in error messages;
 * only their presence is reported.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op when .env doesn't exist
dotenvConfig();

/**
 * Keys are optional at load time and checked when a provider is created,
 * so only the provider in use needs one.
 */
export const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OLLAMA_HOST: z.string().url().default('http://localhost:11434'),
  DOCENT_HOME: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

let _envCache: EnvVars | null = null;

/**
 * Read and cache the environment. An invalid OLLAMA_HOST falls back to
 * the default rather than failing commands that never use Ollama.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const raw = {
    ANTHROPIC_API_KEY: process.env.ANTHROPIC_API_KEY,
    OPENAI_API_KEY: process.env.OPENAI_API_KEY,
    OLLAMA_HOST: process.env.OLLAMA_HOST,
    DOCENT_HOME: process.env.DOCENT_HOME,
  };
  const result = EnvSchema.safeParse(raw);
  _envCache = result.success ? result.data : EnvSchema.parse({ ...raw, OLLAMA_HOST: undefined });

  return _envCache;
}

export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * True when the provider's key is set and non-blank.
 */
export function hasApiKey(provider: 'anthropic' | 'openai'): boolean {
  const env = loadEnv();
  switch (provider) {
    case 'anthropic':
      return Boolean(env.ANTHROPIC_API_KEY?.trim());
    case 'openai':
      return Boolean(env.OPENAI_API_KEY?.trim());
  }
}

export function getOllamaHost(): string {
  return getEnv('OLLAMA_HOST');
}

/**
 * FOR TESTING ONLY - lets tests change process.env between cases.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
