/**
 * Tool Registry
 *
 * Holds the tools available to the agent and enforces their contracts:
 * arguments are validated before the handler runs, the handler runs under
 * a timeout, and the output is validated before anyone sees it.
 */

import { z } from 'zod';

import {
  TimeoutError,
  ToolContractViolation,
  ToolExecutionError,
  ValidationError,
} from '../../errors/index.js';
import { withTimeout } from '../../utils/index.js';
import type { InvokeOptions, ToolDefinition, ToolDescriptor } from './types.js';

const TOOL_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Short type hint for a schema, e.g. "number[] (optional)".
 */
export function describeSchemaType(schema: z.ZodTypeAny): string {
  if (schema instanceof z.ZodOptional) {
    return `${describeSchemaType(schema.unwrap())} (optional)`;
  }
  if (schema instanceof z.ZodDefault) {
    return `${describeSchemaType(schema.removeDefault())} (optional)`;
  }
  if (schema instanceof z.ZodString) return 'string';
  if (schema instanceof z.ZodNumber) return 'number';
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodEnum) {
    const options: readonly string[] = schema.options;
    return options.map((option) => JSON.stringify(option)).join(' | ');
  }
  if (schema instanceof z.ZodArray) {
    return `${describeSchemaType(schema.element)}[]`;
  }
  if (schema instanceof z.ZodObject) {
    const shape: z.ZodRawShape = schema.shape;
    const fields = Object.entries(shape).map(([key, value]) => `${key}: ${describeSchemaType(value)}`);
    return `{ ${fields.join(', ')} }`;
  }
  return 'any';
}

function describeArguments(schema: z.ZodTypeAny): Record<string, string> {
  if (!(schema instanceof z.ZodObject)) {
    return { input: describeSchemaType(schema) };
  }
  const shape: z.ZodRawShape = schema.shape;
  const args: Record<string, string> = {};
  for (const [key, value] of Object.entries(shape)) {
    const hint = describeSchemaType(value);
    args[key] = value.description ? `${hint} - ${value.description}` : hint;
  }
  return args;
}

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();

  /**
   * @throws ValidationError for a malformed or duplicate definition
   */
  register(definition: ToolDefinition): this {
    const issues: string[] = [];
    if (!TOOL_NAME_PATTERN.test(definition.name)) {
      issues.push(`name "${definition.name}" must match ${TOOL_NAME_PATTERN}`);
    } else if (this.tools.has(definition.name)) {
      issues.push(`name "${definition.name}" is already registered`);
    }
    if (!definition.description?.trim()) {
      issues.push('description must not be empty');
    }
    if (!(definition.inputSchema instanceof z.ZodType)) {
      issues.push('inputSchema must be a Zod schema');
    }
    if (!(definition.outputSchema instanceof z.ZodType)) {
      issues.push('outputSchema must be a Zod schema');
    }
    if (typeof definition.handler !== 'function') {
      issues.push('handler must be a function');
    }
    if (definition.maxRetries !== undefined && !(Number.isInteger(definition.maxRetries) && definition.maxRetries >= 0)) {
      issues.push('maxRetries must be a non-negative integer');
    }
    if (definition.timeoutMs !== undefined && !(definition.timeoutMs > 0)) {
      issues.push('timeoutMs must be positive');
    }
    if (issues.length > 0) {
      throw new ValidationError(`Invalid tool definition "${definition.name}"`, issues);
    }

    this.tools.set(definition.name, definition);
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  /** Registration order */
  get names(): string[] {
    return [...this.tools.keys()];
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()].map((tool) => ({
      name: tool.name,
      description: tool.description,
      arguments: describeArguments(tool.inputSchema),
    }));
  }

  /**
   * Validate `args`, run the handler, validate its output.
   *
   * @returns the parsed output
   * @throws ValidationError for an unknown tool
   * @throws ToolContractViolation when input or output fails its schema
   * @throws TimeoutError when the handler exceeds its budget
   * @throws ToolExecutionError when the handler throws
   */
  async invoke(name: string, args: unknown, options: InvokeOptions = {}): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ValidationError(`Unknown tool "${name}"`, [`registered tools: ${this.names.join(', ') || '(none)'}`]);
    }

    const input = tool.inputSchema.safeParse(args);
    if (!input.success) {
      throw new ToolContractViolation(name, 'input', formatZodIssues(input.error));
    }

    const timeoutMs = tool.timeoutMs ?? options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    const context = { scope: options.scope ?? {}, sessionId: options.sessionId ?? '' };

    let raw: unknown;
    try {
      raw = await withTimeout(
        async (signal) => tool.handler(input.data, { ...context, signal }),
        timeoutMs,
        `Tool "${name}"`
      );
    } catch (error) {
      if (error instanceof TimeoutError || error instanceof ToolExecutionError) {
        throw error;
      }
      throw new ToolExecutionError(name, error instanceof Error ? error.message : String(error), error);
    }

    const output = tool.outputSchema.safeParse(raw);
    if (!output.success) {
      throw new ToolContractViolation(name, 'output', formatZodIssues(output.error));
    }
    return output.data;
  }
}
