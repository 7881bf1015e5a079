/**
 * Planner
 *
 * One planning call decides the agent's next action: call a tool or give
 * the final answer. The planner sees only the query, the trace so far and
 * the tool descriptors, so identical inputs produce identical prompts.
 */

import type { TextGenerator } from '../providers/llm.js';
import { PlanningError } from '../errors/index.js';
import { extractJsonObject } from '../utils/index.js';
import { formatZodIssues } from './tools/registry.js';
import type { ToolDescriptor } from './tools/types.js';
import { AgentActionSchema, type AgentAction, type AgentStep } from './types.js';

export interface PlannerInput {
  query: string;
  trace: readonly AgentStep[];
  tools: readonly ToolDescriptor[];
  /** Why the previous planning attempt was rejected, if it was */
  previousError: string | null;
}

export interface PlanCallOptions {
  signal?: AbortSignal;
}

/**
 * Anything that can turn planner input into raw model text. Output is
 * validated by parsePlannedAction, never trusted.
 */
export interface ReasoningProvider {
  plan(input: PlannerInput, options?: PlanCallOptions): Promise<string>;
}

/** Longest serialized observation shown to the planner */
const MAX_OBSERVATION_CHARS = 4000;

export const PLANNER_SYSTEM_PROMPT = `You are a document analyst answering questions about a user's ingested documents (statements, invoices, reports).
You work in steps. At each step reply with ONE JSON object and nothing else:

{"type": "tool_call", "name": "<tool name>", "arguments": { ... }}
or
{"type": "final_answer", "text": "<answer>"}

## Rules
- Call retrieve_knowledge before answering anything about document contents
- Use the analysis tools on figures you retrieved; never invent numbers
- Do not repeat a call that already succeeded with the same arguments
- If a tool failed, fix the arguments or try a different approach
- Give the final answer as soon as the results support it, citing pages like (p. 3)
- If the documents do not contain the answer, say so in the final answer`;

function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max)}... [truncated]`;
}

function formatTool(tool: ToolDescriptor): string {
  const args = Object.entries(tool.arguments)
    .map(([name, hint]) => `    - ${name}: ${hint}`)
    .join('\n');
  return `- ${tool.name}: ${tool.description}\n  arguments:\n${args || '    (none)'}`;
}

function formatStep(step: AgentStep): string {
  const call = `Step ${step.stepIndex + 1}: ${step.action.tool} ${JSON.stringify(step.action.arguments)}`;
  const { observation } = step;
  if (observation.status === 'succeeded') {
    return `${call}\nResult: ${truncate(JSON.stringify(observation.output) ?? 'null', MAX_OBSERVATION_CHARS)}`;
  }
  return `${call}\nFailed (${observation.error.reason}): ${observation.error.message}`;
}

export function buildPlannerPrompt(input: PlannerInput): string {
  const sections = [
    `## Question\n${input.query}`,
    `## Tools\n${input.tools.map(formatTool).join('\n')}`,
    `## Steps so far\n${input.trace.length > 0 ? input.trace.map(formatStep).join('\n\n') : '(none)'}`,
  ];
  if (input.previousError) {
    sections.push(`## Your previous reply was rejected\n${input.previousError}\nReply with one valid JSON object.`);
  }
  sections.push('Next action (JSON only):');
  return sections.join('\n\n');
}

/**
 * Validate raw planner output.
 *
 * @throws PlanningError when the output holds no JSON object, does not
 *   match the action schema, or names an unregistered tool
 */
export function parsePlannedAction(raw: string, toolNames: readonly string[]): AgentAction {
  const json = extractJsonObject(raw);
  if (json === undefined) {
    throw new PlanningError('Planner output contains no JSON object', raw);
  }

  const parsed = AgentActionSchema.safeParse(json);
  if (!parsed.success) {
    throw new PlanningError(
      `Planner output does not match the action schema: ${formatZodIssues(parsed.error).join('; ')}`,
      raw
    );
  }

  const action = parsed.data;
  if (action.type === 'tool_call' && !toolNames.includes(action.name)) {
    throw new PlanningError(
      `Unknown tool "${action.name}" (available: ${toolNames.join(', ')})`,
      raw
    );
  }
  return action;
}

/**
 * ReasoningProvider backed by a language model.
 */
export class LlmReasoningProvider implements ReasoningProvider {
  constructor(private readonly generator: TextGenerator) {}

  plan(input: PlannerInput, options: PlanCallOptions = {}): Promise<string> {
    return this.generator.generate({
      system: PLANNER_SYSTEM_PROMPT,
      prompt: buildPlannerPrompt(input),
      signal: options.signal,
    });
  }
}
