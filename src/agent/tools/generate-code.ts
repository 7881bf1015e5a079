/**
 * generate_code: asks the language model for a code snippet.
 */

import { z } from 'zod';

import type { TextGenerator } from '../../providers/llm.js';
import { defineTool } from './types.js';

const FENCE_PATTERN = /```([\w+#.-]*)[^\n]*\n([\s\S]*?)```/;

const SYSTEM_PROMPT =
  'You are a careful programmer. Reply with exactly one fenced code block and nothing else. ' +
  'Prefer short, dependency-free code with comments only where the logic is not obvious.';

/**
 * The first fenced block of a reply, or the whole reply when it has no
 * fence.
 */
export function extractCodeBlock(reply: string): { language: string | undefined; code: string } {
  const match = FENCE_PATTERN.exec(reply);
  if (!match) {
    return { language: undefined, code: reply.trim() };
  }
  const language = match[1] ? match[1].toLowerCase() : undefined;
  return { language, code: (match[2] ?? '').trimEnd() };
}

const DEFAULT_LANGUAGE = 'typescript';

export const generateCodeInput = z.object({
  task: z.string().trim().min(1).describe('What the code must do'),
  language: z.string().trim().min(1).optional().describe('Target language (default typescript)'),
  context: z.string().optional().describe('Facts or data the code should use, e.g. retrieved figures'),
});

export const generateCodeOutput = z.object({
  language: z.string().min(1),
  code: z.string().min(1),
});

export function buildCodePrompt(input: z.output<typeof generateCodeInput>): string {
  const language = input.language ?? DEFAULT_LANGUAGE;
  const parts = [`Write ${language} code for this task:`, input.task];
  if (input.context) {
    parts.push('', 'Context:', input.context);
  }
  return parts.join('\n');
}

export function createGenerateCodeTool(generator: TextGenerator) {
  return defineTool({
    name: 'generate_code',
    description:
      'Write a code snippet for a computation or transformation (e.g. a script that totals expenses by month).',
    inputSchema: generateCodeInput,
    outputSchema: generateCodeOutput,
    retryable: true,
    handler: async (input, context) => {
      const reply = await generator.generate({
        system: SYSTEM_PROMPT,
        prompt: buildCodePrompt(input),
        signal: context.signal,
      });
      const { language, code } = extractCodeBlock(reply);
      if (code.length === 0) {
        throw new Error('Model returned no code');
      }
      return { language: input.language ?? language ?? DEFAULT_LANGUAGE, code };
    },
  });
}
