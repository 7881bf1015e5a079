/**
 * Agent Types
 *
 * Planner actions, the append-only step trace, and session state.
 * Actions and observations are Zod schemas because they cross trust
 * boundaries: planner output is model text, and stored traces are read back
 * from SQLite.
 */

import { z } from 'zod';
import type { IndexFilter } from '../search/types.js';

// ============================================================================
// PLANNER ACTIONS
// ============================================================================

export const ToolCallActionSchema = z.object({
  type: z.literal('tool_call'),
  name: z.string().min(1).describe('Registered tool name'),
  arguments: z.record(z.unknown()).default({}).describe('Arguments matching the tool input schema'),
});

export const FinalAnswerActionSchema = z.object({
  type: z.literal('final_answer'),
  text: z.string().trim().min(1).describe('Answer shown to the user'),
});

/**
 * The only two things a planning call may decide.
 */
export const AgentActionSchema = z.discriminatedUnion('type', [
  ToolCallActionSchema,
  FinalAnswerActionSchema,
]);

export type ToolCallAction = z.infer<typeof ToolCallActionSchema>;
export type FinalAnswerAction = z.infer<typeof FinalAnswerActionSchema>;
export type AgentAction = z.infer<typeof AgentActionSchema>;

// ============================================================================
// TRACE
// ============================================================================

export const StepFailureReasonSchema = z.enum(['tool_contract_violation', 'tool_error', 'timeout']);
export type StepFailureReason = z.infer<typeof StepFailureReasonSchema>;

export const StepActionSchema = z.object({
  tool: z.string(),
  arguments: z.record(z.unknown()),
});
export type StepAction = z.infer<typeof StepActionSchema>;

export const StepObservationSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('succeeded'), output: z.unknown() }),
  z.object({
    status: z.literal('failed'),
    error: z.object({
      reason: StepFailureReasonSchema,
      message: z.string(),
      retryable: z.boolean(),
    }),
  }),
]);
export type StepObservation = z.infer<typeof StepObservationSchema>;

/**
 * One tool call and what came back. Steps are frozen once appended.
 */
export interface AgentStep {
  /** 0-based position in the trace */
  stepIndex: number;
  action: StepAction;
  observation: StepObservation;
  /** ISO timestamp from the orchestrator's clock */
  timestamp: string;
}

// ============================================================================
// SESSION
// ============================================================================

export type SessionStatus = 'running' | 'succeeded' | 'failed' | 'truncated';

export const FailureReasonSchema = z.enum([
  'cancelled',
  'planning_error',
  'tool_error',
  'tool_contract_violation',
  'timeout',
  'internal_error',
]);
export type FailureReason = z.infer<typeof FailureReasonSchema>;

export interface SessionFailure {
  reason: FailureReason;
  message: string;
}

/**
 * The result of one query. Terminal once status leaves 'running'.
 */
export interface AgentSession {
  id: string;
  query: string;
  trace: readonly AgentStep[];
  status: SessionStatus;
  /** Set only when status is 'succeeded' */
  finalAnswer: string | null;
  /** Best-effort answer for truncated/failed sessions, prefixed "[partial]" */
  partialAnswer: string | null;
  failure: SessionFailure | null;
  createdAt: string;
  completedAt: string | null;
}

/**
 * Restricts what a session's tools may look at.
 */
export interface QueryScope {
  documentIds?: string[];
  filters?: IndexFilter;
}
