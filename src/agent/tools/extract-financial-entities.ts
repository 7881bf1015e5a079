/**
 * extract_financial_entities: pattern-based extraction of amounts, dates
 * and account numbers from text.
 */

import { z } from 'zod';

import { defineTool } from './types.js';

const AMOUNT_PATTERN = /\$\d[\d,]*(?:\.\d+)?/g;

const DATE_PATTERNS = [
  /\b\d{1,2}\/\d{1,2}\/\d{2,4}\b/g,
  /\b\d{4}-\d{2}-\d{2}\b/g,
  /\b(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]* \d{1,2},? \d{4}\b/gi,
];

const ACCOUNT_PATTERN = /\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}\b/g;

export interface FinancialEntities {
  amounts: string[];
  dates: string[];
  accountNumbers: string[];
}

function matchAll(text: string, pattern: RegExp): string[] {
  return Array.from(text.matchAll(pattern), (match) => match[0]);
}

/**
 * Dates are listed per pattern (numeric, ISO, then month names), each in
 * text order.
 */
export function extractFinancialEntities(text: string): FinancialEntities {
  return {
    amounts: matchAll(text, AMOUNT_PATTERN),
    dates: DATE_PATTERNS.flatMap((pattern) => matchAll(text, pattern)),
    accountNumbers: matchAll(text, ACCOUNT_PATTERN),
  };
}

export const extractFinancialEntitiesInput = z.object({
  text: z.string().min(1).max(200_000).describe('Text to scan, e.g. a retrieved chunk'),
});

export const extractFinancialEntitiesOutput = z.object({
  amounts: z.array(z.string()),
  dates: z.array(z.string()),
  accountNumbers: z.array(z.string()),
});

export function createExtractFinancialEntitiesTool() {
  return defineTool({
    name: 'extract_financial_entities',
    description: 'Pull dollar amounts, dates and 16-digit account numbers out of a piece of text.',
    inputSchema: extractFinancialEntitiesInput,
    outputSchema: extractFinancialEntitiesOutput,
    handler: ({ text }) => extractFinancialEntities(text),
  });
}
