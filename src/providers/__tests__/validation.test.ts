/**
 * API Key Lookup Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { getProviderKey } from '../validation.js';
import { APIKeyError } from '../../errors/index.js';
import { _clearEnvCache } from '../../config/env.js';

describe('getProviderKey', () => {
  beforeEach(() => {
    _clearEnvCache();
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  it('returns the trimmed key', () => {
    vi.stubEnv('OPENAI_API_KEY', '  test-secret \n');

    expect(getProviderKey('openai')).toBe('test-secret');
  });

  it('throws APIKeyError when the key is blank', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', '');

    expect(() => getProviderKey('anthropic')).toThrow(APIKeyError);
  });

  it('names the environment variable without revealing any value', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', '');

    try {
      getProviderKey('anthropic');
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({
        message: 'Anthropic API key not configured',
        hint: 'Set the ANTHROPIC_API_KEY environment variable (or add it to .env)',
        code: 4,
      });
    }
  });
});
