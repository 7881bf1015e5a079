/**
 * Ollama LLM Provider
 *
 * Talks to a local Ollama server through its OpenAI-compatible /v1 API, so
 * no API key is needed.
 */

import { createOpenAI } from '@ai-sdk/openai';
import type { LanguageModel } from 'ai';
import { getOllamaHost } from '../config/env.js';

export interface OllamaProviderOptions {
  /**
   * Model to use for completions.
   * @default 'llama3.2'
   */
  model?: string;
  /** Server URL (defaults to OLLAMA_HOST or http://localhost:11434) */
  host?: string;
}

export interface OllamaProviderResult {
  provider: LanguageModel;
  name: 'ollama';
  model: string;
}

export const DEFAULT_OLLAMA_MODEL = 'llama3.2';

/**
 * The OpenAI-compatible base URL for an Ollama host.
 */
export function ollamaBaseUrl(host: string): string {
  return `${host.replace(/\/+$/, '')}/v1`;
}

export function createOllamaProvider(options: OllamaProviderOptions = {}): OllamaProviderResult {
  const model = options.model ?? DEFAULT_OLLAMA_MODEL;
  const ollama = createOpenAI({
    // Ollama ignores the key but the client requires one
    apiKey: 'ollama',
    baseURL: ollamaBaseUrl(options.host ?? getOllamaHost()),
  });
  return { provider: ollama.chat(model), name: 'ollama', model };
}
