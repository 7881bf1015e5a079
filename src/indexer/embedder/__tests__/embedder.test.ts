/**
 * Embedder Tests
 *
 * Uses in-process providers; nothing here reaches a network.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { embedChunks, embedText, embedTexts } from '../embedder.js';
import { createEmbeddingProvider, getModelDimensions } from '../provider.js';
import type { EmbeddingProvider } from '../types.js';
import {
  APIKeyError,
  ConfigError,
  EmbeddingUnavailableError,
  ProviderError,
} from '../../../errors/index.js';
import { _clearEnvCache } from '../../../config/env.js';
import { FakeEmbeddingProvider } from '../../../test-utils/index.js';

const fastPolicy = { timeoutMs: 1000, maxRetries: 2, retryBaseDelayMs: 0 };

function createMockProvider(overrides: Partial<EmbeddingProvider> = {}): EmbeddingProvider {
  const fake = new FakeEmbeddingProvider({ dimensions: 3 });
  return {
    name: 'fake',
    model: 'fake-embedding',
    dimensions: 3,
    embed: vi.fn((text: string) => fake.embed(text)),
    embedBatch: vi.fn((texts: string[]) => fake.embedBatch(texts)),
    ...overrides,
  };
}

describe('embedTexts', () => {
  it('embeds in batches and keeps input order', async () => {
    const provider = new FakeEmbeddingProvider({ dimensions: 3 });
    const texts = ['a', 'b', 'c', 'd', 'e'];

    const vectors = await embedTexts(texts, provider, { batchSize: 2, ...fastPolicy });

    expect(provider.calls).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
    expect(vectors).toHaveLength(5);
    vectors.forEach((vector, i) => {
      expect(vector).toBeInstanceOf(Float32Array);
      expect(Array.from(vector)).toEqual(
        Array.from(new Float32Array(provider.vectorFor(texts[i] ?? '')))
      );
    });
  });

  it('reports progress after each batch', async () => {
    const onProgress = vi.fn();
    await embedTexts(['a', 'b', 'c', 'd', 'e'], new FakeEmbeddingProvider(), {
      batchSize: 2,
      onProgress,
      ...fastPolicy,
    });

    expect(onProgress.mock.calls).toEqual([
      [2, 5],
      [4, 5],
      [5, 5],
    ]);
  });

  it('returns an empty list without calling the provider', async () => {
    const provider = new FakeEmbeddingProvider();
    expect(await embedTexts([], provider)).toEqual([]);
    expect(provider.calls).toEqual([]);
  });

  it('retries a batch after a transient failure', async () => {
    const provider = createMockProvider();
    vi.mocked(provider.embedBatch).mockRejectedValueOnce(new ProviderError('fake', 'overloaded'));

    const vectors = await embedTexts(['x', 'y'], provider, fastPolicy);

    expect(vectors).toHaveLength(2);
    expect(provider.embedBatch).toHaveBeenCalledTimes(2);
    expect(provider.embed).not.toHaveBeenCalled();
  });

  it('falls back to one request per chunk when a batch keeps failing', async () => {
    const provider = createMockProvider({
      embedBatch: vi.fn().mockRejectedValue(new ProviderError('fake', 'batch too large')),
    });
    const logger = { warn: vi.fn(), debug: vi.fn() };

    const vectors = await embedTexts(['x', 'y'], provider, { ...fastPolicy, logger });

    expect(vectors).toHaveLength(2);
    expect(provider.embedBatch).toHaveBeenCalledTimes(3);
    expect(provider.embed).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith('Batch 1 failed, embedding its 2 chunk(s) one by one');
    expect(logger.debug).toHaveBeenCalledWith('Batch 1 attempt 1 failed: fake: batch too large');
  });

  it('fails the whole call when a chunk cannot be embedded', async () => {
    const provider = createMockProvider({
      embedBatch: vi.fn().mockRejectedValue(new ProviderError('fake', 'down')),
      embed: vi.fn().mockRejectedValue(new ProviderError('fake', 'down')),
    });

    const promise = embedTexts(['x', 'y'], provider, fastPolicy);

    await expect(promise).rejects.toBeInstanceOf(EmbeddingUnavailableError);
    await expect(promise).rejects.toMatchObject({
      attempts: 3,
      message: 'Embedding provider unavailable: fake: down (after 3 attempts)',
    });
  });

  it('rejects vectors with the wrong dimensionality', async () => {
    const provider = createMockProvider({
      embedBatch: vi.fn().mockResolvedValue([[1, 2]]),
    });

    await expect(embedTexts(['x'], provider, fastPolicy)).rejects.toThrow(
      'fake: model fake-embedding returned 2 dimensions, expected 3'
    );
  });

  it('rejects a batch response with the wrong vector count', async () => {
    const provider = createMockProvider({
      embedBatch: vi.fn().mockResolvedValue([[1, 2, 3]]),
    });

    await expect(embedTexts(['x', 'y'], provider, fastPolicy)).rejects.toThrow(
      'fake: embedBatch returned 1 vectors for 2 inputs'
    );
  });
});

describe('embedText', () => {
  it('stops after one attempt on a non-retryable error', async () => {
    const provider = createMockProvider({
      embed: vi.fn().mockRejectedValue(new ProviderError('fake', 'invalid key', { retryable: false })),
    });

    const promise = embedText(provider, 'query', fastPolicy);

    await expect(promise).rejects.toMatchObject({ name: 'EmbeddingUnavailableError', attempts: 1 });
    expect(provider.embed).toHaveBeenCalledTimes(1);
  });

  it('times out a hanging request and retries it', async () => {
    const provider = createMockProvider({
      embed: vi.fn(() => new Promise<number[]>(() => {})),
    });

    const promise = embedText(provider, 'query', {
      timeoutMs: 20,
      maxRetries: 1,
      retryBaseDelayMs: 0,
    });

    await expect(promise).rejects.toThrow(
      'Embedding provider unavailable: Embedding request timed out after 20ms (after 2 attempts)'
    );
    expect(provider.embed).toHaveBeenCalledTimes(2);
  });

  it('passes an abort signal to the provider', async () => {
    const provider = createMockProvider();
    await embedText(provider, 'query', fastPolicy);

    const [, options] = vi.mocked(provider.embed).mock.calls[0] ?? [];
    expect(options?.signal).toBeInstanceOf(AbortSignal);
  });
});

describe('embedChunks', () => {
  it('sets the embedding on every chunk', async () => {
    const provider = new FakeEmbeddingProvider({ vectors: { alpha: [1, 0, 0, 0] } });
    const chunks = [
      { text: 'alpha', embedding: null as Float32Array | null },
      { text: 'beta', embedding: null as Float32Array | null },
    ];

    const result = await embedChunks(chunks, provider, fastPolicy);

    expect(result).toBe(chunks);
    expect(Array.from(chunks[0]?.embedding ?? [])).toEqual([1, 0, 0, 0]);
    expect(chunks[1]?.embedding).toHaveLength(4);
  });
});

describe('getModelDimensions', () => {
  it('knows common models', () => {
    expect(getModelDimensions('text-embedding-3-small')).toBe(1536);
    expect(getModelDimensions('text-embedding-3-large')).toBe(3072);
  });

  it('ignores Ollama tags', () => {
    expect(getModelDimensions('nomic-embed-text:latest')).toBe(768);
  });

  it('returns undefined for unknown models', () => {
    expect(getModelDimensions('my-custom-model')).toBeUndefined();
  });
});

describe('createEmbeddingProvider', () => {
  beforeEach(() => {
    _clearEnvCache();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    _clearEnvCache();
  });

  it('requires OPENAI_API_KEY for openai', () => {
    vi.stubEnv('OPENAI_API_KEY', '');
    expect(() =>
      createEmbeddingProvider({ provider: 'openai', model: 'text-embedding-3-small', dimensions: 1536 })
    ).toThrow(APIKeyError);
  });

  it('rejects dimensions that contradict a known model', () => {
    expect(() =>
      createEmbeddingProvider({ provider: 'ollama', model: 'nomic-embed-text', dimensions: 1024 })
    ).toThrow(ConfigError);
  });

  it('creates an ollama provider without a key', () => {
    const provider = createEmbeddingProvider({
      provider: 'ollama',
      model: 'nomic-embed-text',
      dimensions: 768,
    });

    expect(provider.name).toBe('ollama');
    expect(provider.model).toBe('nomic-embed-text');
    expect(provider.dimensions).toBe(768);
  });

  it('creates an openai provider when the key is set', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');
    const provider = createEmbeddingProvider({
      provider: 'openai',
      model: 'text-embedding-3-small',
      dimensions: 1536,
    });

    expect(provider.name).toBe('openai');
  });
});
