/**
 * LLM Providers Module
 *
 * Language models (Anthropic, OpenAI, Ollama) through the AI SDK, plus
 * the TextGenerator seam used by the planner and LLM-backed tools.
 *
 * @example
 * ```typescript
 * import { createLLMProvider, LlmTextGenerator } from './providers';
 *
 * const generator = new LlmTextGenerator(createLLMProvider(config), config.llm);
 * ```
 */

export {
  createLLMProvider,
  LlmTextGenerator,
  type LLMProviderResult,
  type ProviderType,
  type GenerateRequest,
  type TextGenerator,
} from './llm.js';

export { createAnthropicProvider, DEFAULT_ANTHROPIC_MODEL, type AnthropicProviderOptions } from './anthropic.js';
export { createOpenAIProvider, DEFAULT_OPENAI_MODEL, type OpenAIProviderOptions } from './openai.js';
export { createOllamaProvider, ollamaBaseUrl, DEFAULT_OLLAMA_MODEL, type OllamaProviderOptions } from './ollama.js';
export { getProviderKey, type KeyedProvider } from './validation.js';
export { toProviderError } from './errors.js';
