/**
 * Deterministic embedding provider for tests. No network, no model.
 */

import type { EmbedCallOptions, EmbeddingProvider } from '../indexer/embedder/types.js';

export interface FakeEmbeddingProviderOptions {
  dimensions?: number;
  /** Exact vectors for specific texts; other texts get a hashed vector */
  vectors?: Record<string, number[]>;
}

/**
 * Hash a text into a stable vector with components in [-1, 1].
 */
export function hashVector(text: string, dimensions: number): number[] {
  let seed = 2166136261;
  for (let i = 0; i < text.length; i++) {
    seed = Math.imul(seed ^ text.charCodeAt(i), 16777619) >>> 0;
  }
  return Array.from({ length: dimensions }, (_, i) => Math.sin(seed + i * 7919));
}

export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'fake';
  readonly model = 'fake-embedding';
  readonly dimensions: number;
  /** Every text passed to embed/embedBatch, in call order */
  readonly calls: string[][] = [];
  private readonly vectors: Record<string, number[]>;

  constructor(options: FakeEmbeddingProviderOptions = {}) {
    this.dimensions = options.dimensions ?? 4;
    this.vectors = options.vectors ?? {};
  }

  vectorFor(text: string): number[] {
    return this.vectors[text] ?? hashVector(text, this.dimensions);
  }

  async embed(text: string, _options?: EmbedCallOptions): Promise<number[]> {
    this.calls.push([text]);
    return this.vectorFor(text);
  }

  async embedBatch(texts: string[], _options?: EmbedCallOptions): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((text) => this.vectorFor(text));
  }
}
