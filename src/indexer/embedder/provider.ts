/**
 * Embedding Provider Factory
 *
 * Creates embedding providers from configuration. Supports:
 * - OpenAI (text-embedding-3-*, needs OPENAI_API_KEY)
 * - Ollama (local server; its OpenAI-compatible /v1 endpoint)
 *
 * Both go through the AI SDK; request errors are translated into
 * ProviderError by toProviderError.
 */

import { createOpenAI } from '@ai-sdk/openai';
import { embed, embedMany, type EmbeddingModel } from 'ai';

import { getOllamaHost } from '../../config/index.js';
import { ConfigError } from '../../errors/index.js';
import { toProviderError } from '../../providers/errors.js';
import { ollamaBaseUrl } from '../../providers/ollama.js';
import { getProviderKey } from '../../providers/validation.js';
import type {
  EmbedCallOptions,
  EmbeddingProvider,
  EmbeddingProviderConfig,
} from './types.js';

/**
 * Known model dimensions. Used to catch a config whose `dimensions` does
 * not match its model before anything is embedded.
 */
const MODEL_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
  'nomic-embed-text': 768,
  'mxbai-embed-large': 1024,
  'all-minilm': 384,
  'bge-m3': 1024,
};

/**
 * Dimensions of a known model, or undefined for models we don't know.
 */
export function getModelDimensions(model: string): number | undefined {
  // Ollama tags (nomic-embed-text:latest) share the base model's size
  const base = model.split(':')[0] ?? model;
  return MODEL_DIMENSIONS[base];
}

/**
 * EmbeddingProvider backed by an AI SDK embedding model.
 *
 * The SDK's own retries are disabled; the embedder applies the configured
 * retry policy.
 */
export class AiSdkEmbeddingProvider implements EmbeddingProvider {
  constructor(
    readonly name: string,
    readonly model: string,
    readonly dimensions: number,
    private readonly embeddingModel: EmbeddingModel<string>
  ) {}

  async embed(text: string, options: EmbedCallOptions = {}): Promise<number[]> {
    try {
      const result = await embed({
        model: this.embeddingModel,
        value: text,
        maxRetries: 0,
        abortSignal: options.signal,
      });
      return result.embedding;
    } catch (error) {
      throw toProviderError(this.name, error);
    }
  }

  async embedBatch(texts: string[], options: EmbedCallOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    try {
      const result = await embedMany({
        model: this.embeddingModel,
        values: texts,
        maxRetries: 0,
        abortSignal: options.signal,
      });
      return result.embeddings;
    } catch (error) {
      throw toProviderError(this.name, error);
    }
  }
}

/**
 * Create an embedding provider from the [embedding] config section.
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const provider = createEmbeddingProvider(config.embedding);
 * const vector = await provider.embed('quarterly revenue');
 * ```
 *
 * @throws APIKeyError if OpenAI is selected and OPENAI_API_KEY is unset
 * @throws ConfigError if `dimensions` contradicts a known model
 */
export function createEmbeddingProvider(config: EmbeddingProviderConfig): EmbeddingProvider {
  const known = getModelDimensions(config.model);
  if (known !== undefined && known !== config.dimensions) {
    throw new ConfigError(
      `Embedding model '${config.model}' produces ${known} dimensions, but embedding.dimensions is ${config.dimensions}`,
      `Run: docent config set embedding.dimensions ${known}`
    );
  }

  switch (config.provider) {
    case 'openai': {
      const client = createOpenAI({ apiKey: getProviderKey('openai') });
      return new AiSdkEmbeddingProvider(
        'openai',
        config.model,
        config.dimensions,
        client.textEmbeddingModel(config.model)
      );
    }
    case 'ollama': {
      const client = createOpenAI({
        // Ollama ignores the key but the client requires one
        apiKey: 'ollama',
        baseURL: ollamaBaseUrl(getOllamaHost()),
      });
      return new AiSdkEmbeddingProvider(
        'ollama',
        config.model,
        config.dimensions,
        client.textEmbeddingModel(config.model)
      );
    }
  }
}
