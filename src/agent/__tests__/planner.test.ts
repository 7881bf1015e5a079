/**
 * Planner Tests
 */

import { describe, it, expect, vi } from 'vitest';

import {
  LlmReasoningProvider,
  PLANNER_SYSTEM_PROMPT,
  buildPlannerPrompt,
  parsePlannedAction,
  type PlannerInput,
} from '../planner.js';
import { PlanningError } from '../../errors/index.js';
import type { GenerateRequest } from '../../providers/llm.js';

const input: PlannerInput = {
  query: 'How much did we spend on rent?',
  trace: [
    {
      stepIndex: 0,
      action: { tool: 'retrieve_knowledge', arguments: { query: 'rent' } },
      observation: { status: 'succeeded', output: { results: [] } },
      timestamp: '2024-01-01T00:00:00.000Z',
    },
    {
      stepIndex: 1,
      action: { tool: 'detect_anomalies', arguments: {} },
      observation: {
        status: 'failed',
        error: { reason: 'tool_contract_violation', message: 'values: Required', retryable: false },
      },
      timestamp: '2024-01-01T00:00:01.000Z',
    },
  ],
  tools: [{ name: 'retrieve_knowledge', description: 'Search documents', arguments: { query: 'string' } }],
  previousError: null,
};

describe('parsePlannedAction', () => {
  it('reads a tool call wrapped in prose and a code fence', () => {
    const raw = 'Let me search.\n```json\n{"type": "tool_call", "name": "retrieve_knowledge"}\n```';

    expect(parsePlannedAction(raw, ['retrieve_knowledge'])).toEqual({
      type: 'tool_call',
      name: 'retrieve_knowledge',
      arguments: {},
    });
  });

  it('reads a final answer', () => {
    expect(parsePlannedAction('{"type":"final_answer","text":" Rent was $1,200. "}', [])).toEqual({
      type: 'final_answer',
      text: 'Rent was $1,200.',
    });
  });

  it('rejects output without JSON', () => {
    expect(() => parsePlannedAction('I am not sure.', [])).toThrow('Planner output contains no JSON object');
  });

  it('rejects JSON that is not an action', () => {
    expect(() => parsePlannedAction('{"type":"final_answer"}', [])).toThrow(
      'Planner output does not match the action schema: text: Required'
    );
  });

  it('rejects unregistered tools and keeps the raw output', () => {
    const raw = '{"type":"tool_call","name":"delete_everything","arguments":{}}';

    try {
      parsePlannedAction(raw, ['retrieve_knowledge']);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PlanningError);
      expect(error).toMatchObject({
        message: 'Unknown tool "delete_everything" (available: retrieve_knowledge)',
        rawOutput: raw,
      });
    }
  });
});

describe('buildPlannerPrompt', () => {
  it('lists the question, tools and steps', () => {
    const prompt = buildPlannerPrompt(input);

    expect(prompt).toContain('## Question\nHow much did we spend on rent?');
    expect(prompt).toContain('- retrieve_knowledge: Search documents\n  arguments:\n    - query: string');
    expect(prompt).toContain('Step 1: retrieve_knowledge {"query":"rent"}\nResult: {"results":[]}');
    expect(prompt).toContain('Step 2: detect_anomalies {}\nFailed (tool_contract_violation): values: Required');
    expect(prompt).not.toContain('previous reply was rejected');
  });

  it('includes the rejection of the previous reply', () => {
    const prompt = buildPlannerPrompt({ ...input, trace: [], previousError: 'Planner output contains no JSON object' });

    expect(prompt).toContain('## Steps so far\n(none)');
    expect(prompt).toContain(
      '## Your previous reply was rejected\nPlanner output contains no JSON object\nReply with one valid JSON object.'
    );
  });

  it('is identical for identical input', () => {
    expect(buildPlannerPrompt(input)).toBe(buildPlannerPrompt(structuredClone(input)));
  });
});

describe('LlmReasoningProvider', () => {
  it('sends the system prompt and the built prompt', async () => {
    const generate = vi.fn(async (_request: GenerateRequest) => '{"type":"final_answer","text":"ok"}');
    const controller = new AbortController();

    const raw = await new LlmReasoningProvider({ generate }).plan(input, { signal: controller.signal });

    expect(raw).toBe('{"type":"final_answer","text":"ok"}');
    expect(generate).toHaveBeenCalledWith({
      system: PLANNER_SYSTEM_PROMPT,
      prompt: buildPlannerPrompt(input),
      signal: controller.signal,
    });
  });
});
