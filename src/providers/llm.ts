/**
 * LLM Provider Factory
 *
 * Central entry point for creating the language model used for planning
 * and code generation, based on the [llm] config section.
 *
 * USAGE:
 * ```typescript
 * const config = loadConfig();
 * const llm = createLLMProvider(config);
 * const generator = new LlmTextGenerator(llm, config.llm);
 *
 * const text = await generator.generate({ prompt: 'Summarise: ...' });
 * ```
 */

import { generateText, type LanguageModel } from 'ai';
import type { Config } from '../config/schema.js';
import { createAnthropicProvider } from './anthropic.js';
import { createOllamaProvider } from './ollama.js';
import { createOpenAIProvider } from './openai.js';
import { toProviderError } from './errors.js';

// ============================================================================
// TYPES
// ============================================================================

export type ProviderType = Config['llm']['provider'];

/**
 * A created language model plus metadata for logs and error messages.
 */
export interface LLMProviderResult {
  provider: LanguageModel;
  name: ProviderType;
  /** e.g. 'claude-sonnet-4-20250514', 'gpt-4o', 'llama3.2' */
  model: string;
}

export interface GenerateRequest {
  system?: string;
  prompt: string;
  signal?: AbortSignal;
  temperature?: number;
  maxOutputTokens?: number;
}

/**
 * Anything that completes a prompt. Planners and LLM-backed tools depend on
 * this rather than on the AI SDK, so tests can pass a stub.
 */
export interface TextGenerator {
  generate(request: GenerateRequest): Promise<string>;
}

// ============================================================================
// FACTORY
// ============================================================================

/**
 * Create the configured language model.
 *
 * @throws APIKeyError if the provider needs a key that isn't set
 */
export function createLLMProvider(config: Pick<Config, 'llm'>): LLMProviderResult {
  const { provider, model } = config.llm;
  switch (provider) {
    case 'anthropic':
      return createAnthropicProvider({ model });
    case 'openai':
      return createOpenAIProvider({ model });
    case 'ollama':
      return createOllamaProvider({ model });
  }
}

// ============================================================================
// TEXT GENERATION
// ============================================================================

/**
 * TextGenerator over the AI SDK's generateText.
 *
 * SDK retries are disabled: callers (planner, tool registry) own the retry
 * policy. Failures surface as ProviderError.
 */
export class LlmTextGenerator implements TextGenerator {
  constructor(
    private readonly llm: LLMProviderResult,
    private readonly defaults: { temperature?: number; max_output_tokens?: number } = {}
  ) {}

  get name(): string {
    return `${this.llm.name}/${this.llm.model}`;
  }

  async generate(request: GenerateRequest): Promise<string> {
    try {
      const result = await generateText({
        model: this.llm.provider,
        system: request.system,
        prompt: request.prompt,
        temperature: request.temperature ?? this.defaults.temperature,
        maxOutputTokens: request.maxOutputTokens ?? this.defaults.max_output_tokens,
        maxRetries: 0,
        abortSignal: request.signal,
      });
      return result.text;
    } catch (error) {
      throw toProviderError(this.llm.name, error);
    }
  }
}
