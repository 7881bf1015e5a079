/**
 * CLI input validation tests
 */

import { describe, it, expect } from 'vitest';

import {
  AskOptionsSchema,
  collect,
  IngestOptionsSchema,
  parseCommandInput,
  SearchArgsSchema,
  SearchOptionsSchema,
} from '../validation.js';
import { ValidationError } from '../../errors/index.js';

describe('parseCommandInput', () => {
  it('coerces numeric options', () => {
    expect(parseCommandInput(AskOptionsSchema, { maxSteps: '4' })).toEqual({ maxSteps: 4, trace: false });
    expect(parseCommandInput(SearchOptionsSchema, { k: '12', document: ['doc-1'] })).toEqual({
      k: 12,
      document: ['doc-1'],
    });
  });

  it('rejects numbers out of range', () => {
    expect(() => parseCommandInput(SearchOptionsSchema, { k: '101' })).toThrow(ValidationError);
    expect(() => parseCommandInput(AskOptionsSchema, { maxSteps: '2.5' })).toThrow(ValidationError);
  });

  it('lists every issue with its path', () => {
    try {
      parseCommandInput(IngestOptionsSchema, { tag: ['ok', '  '] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ message: 'Invalid command input', issues: ['tag.1: Tag cannot be empty'] });
    }
  });

  it('trims queries', () => {
    expect(parseCommandInput(SearchArgsSchema, { query: '  rent  ' })).toEqual({ query: 'rent' });
    expect(() => parseCommandInput(SearchArgsSchema, { query: '   ' })).toThrow('Invalid command input');
  });
});

describe('collect', () => {
  it('accumulates repeated values', () => {
    expect(collect('a', undefined)).toEqual(['a']);
    expect(collect('b', ['a'])).toEqual(['a', 'b']);
  });
});
