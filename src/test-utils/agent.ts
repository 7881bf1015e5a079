/**
 * Scripted planner for orchestrator tests.
 */

import type { PlannerInput, ReasoningProvider } from '../agent/planner.js';

export type PlannerReply = string | Error;

export function toolCall(name: string, args: Record<string, unknown> = {}): string {
  return JSON.stringify({ type: 'tool_call', name, arguments: args });
}

export function finalAnswer(text: string): string {
  return JSON.stringify({ type: 'final_answer', text });
}

/**
 * Replies with the scripted outputs in order, then with `fallback` forever.
 * Error replies are thrown.
 */
export class ScriptedPlanner implements ReasoningProvider {
  /** Every input received, in call order */
  readonly inputs: PlannerInput[] = [];
  private readonly replies: PlannerReply[];

  constructor(
    replies: PlannerReply[],
    private readonly fallback?: PlannerReply
  ) {
    this.replies = [...replies];
  }

  async plan(input: PlannerInput): Promise<string> {
    this.inputs.push(input);
    const reply = this.replies.shift() ?? this.fallback;
    if (reply === undefined) {
      throw new Error('ScriptedPlanner has no reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}
