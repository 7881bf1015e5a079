/**
 * Tool Types
 *
 * A tool is a named, schema-checked function the agent may call. Both
 * directions are Zod schemas: arguments come from model output, and
 * outputs are recorded in the session trace.
 */

import type { z } from 'zod';
import type { QueryScope } from '../types.js';

/**
 * Passed to every handler invocation.
 */
export interface ToolContext {
  /** Aborts when the tool's time budget runs out */
  signal: AbortSignal;
  /** Documents and filters the session is restricted to */
  scope: QueryScope;
  sessionId: string;
}

export interface ToolDefinition<
  I extends z.ZodTypeAny = z.ZodTypeAny,
  O extends z.ZodTypeAny = z.ZodTypeAny,
> {
  /** snake_case, unique per registry */
  name: string;
  /** Shown to the planner; say when to use the tool */
  description: string;
  inputSchema: I;
  outputSchema: O;
  handler(input: z.output<I>, context: ToolContext): Promise<z.input<O>> | z.input<O>;
  /** Failed calls may be retried by the orchestrator (default false) */
  retryable?: boolean;
  /** Failed attempts allowed per session; defaults to agent.max_tool_retries */
  maxRetries?: number;
  /** Overrides agent.tool_timeout_ms for this tool */
  timeoutMs?: number;
}

/**
 * What the planner sees of a tool.
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  /** Argument name -> human-readable type hint */
  arguments: Record<string, string>;
}

export interface InvokeOptions {
  scope?: QueryScope;
  sessionId?: string;
  /** Used when the tool sets no timeoutMs of its own */
  timeoutMs?: number;
}

/**
 * Keeps handler input/output types tied to the schemas at the definition
 * site.
 *
 * @example
 * ```typescript
 * const echo = defineTool({
 *   name: 'echo',
 *   description: 'Repeat the input',
 *   inputSchema: z.object({ text: z.string() }),
 *   outputSchema: z.object({ text: z.string() }),
 *   handler: ({ text }) => ({ text }),
 * });
 * ```
 */
export function defineTool<I extends z.ZodTypeAny, O extends z.ZodTypeAny>(
  definition: ToolDefinition<I, O>
): ToolDefinition<I, O> {
  return definition;
}
