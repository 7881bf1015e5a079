/**
 * Startup Validation Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../env.js', () => ({
  hasApiKey: vi.fn(),
}));

import {
  validateStartupConfig,
  getValidationOptionsForCommand,
} from '../startup-validation.js';
import { hasApiKey } from '../env.js';
import { DEFAULT_CONFIG } from '../defaults.js';
import type { Config } from '../schema.js';

function configWith(llm: Config['llm']['provider'], embedding: Config['embedding']['provider']) {
  return {
    llm: { ...DEFAULT_CONFIG.llm, provider: llm },
    embedding: { ...DEFAULT_CONFIG.embedding, provider: embedding },
  };
}

describe('validateStartupConfig', () => {
  beforeEach(() => {
    vi.mocked(hasApiKey).mockReset();
  });

  it('passes when the keys are set', () => {
    vi.mocked(hasApiKey).mockReturnValue(true);

    expect(validateStartupConfig(configWith('anthropic', 'openai'))).toEqual({
      valid: true,
      errors: [],
      hints: [],
    });
  });

  it('reports a missing Anthropic key', () => {
    vi.mocked(hasApiKey).mockImplementation((provider) => provider === 'openai');

    const result = validateStartupConfig(configWith('anthropic', 'openai'));

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['Anthropic API key not set (llm.provider = "anthropic")']);
  });

  it('reports the OpenAI key once per use', () => {
    vi.mocked(hasApiKey).mockReturnValue(false);

    const result = validateStartupConfig(configWith('openai', 'openai'));

    expect(result.errors).toEqual([
      'OpenAI API key not set (llm.provider = "openai")',
      'OpenAI API key not set (embedding.provider = "openai")',
    ]);
    expect(result.hints).toHaveLength(2);
  });

  it('needs no key for ollama', () => {
    vi.mocked(hasApiKey).mockReturnValue(false);

    expect(validateStartupConfig(configWith('ollama', 'ollama')).valid).toBe(true);
    expect(hasApiKey).not.toHaveBeenCalled();
  });

  it('honours the skip options', () => {
    vi.mocked(hasApiKey).mockReturnValue(false);

    expect(validateStartupConfig(configWith('anthropic', 'openai'), { skipLLM: true, skipEmbedding: true }).valid).toBe(
      true
    );
  });
});

describe('getValidationOptionsForCommand', () => {
  it('checks both providers for ask', () => {
    expect(getValidationOptionsForCommand('ask')).toEqual({ skipLLM: false, skipEmbedding: false });
  });

  it('checks only embeddings for ingest and search', () => {
    expect(getValidationOptionsForCommand('ingest')).toEqual({ skipLLM: true, skipEmbedding: false });
    expect(getValidationOptionsForCommand('search')).toEqual({ skipLLM: true, skipEmbedding: false });
  });

  it('checks nothing for local commands', () => {
    expect(getValidationOptionsForCommand('list')).toEqual({ skipLLM: true, skipEmbedding: true });
  });
});
