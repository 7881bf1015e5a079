/**
 * Agent Orchestrator
 *
 * Runs one query as a bounded state machine:
 *
 *   PLANNING -> ACTING -> OBSERVING -> PLANNING ... -> DONE | FAILED | TRUNCATED
 *
 * The orchestrator holds no per-session state; every run gets its own
 * RunContext, so one instance serves concurrent sessions. The clock and id
 * generator are injected, which makes a run fully determined by the query,
 * the prior trace and the planner/tool outputs.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';

import {
  PlanningError,
  ProviderError,
  TimeoutError,
  ToolContractViolation,
  ToolExecutionError,
  ValidationError,
} from '../errors/index.js';
import { RetryExhaustedError, retryWithBackoff, silentLogger, withTimeout, type Logger } from '../utils/index.js';
import { parsePlannedAction, type ReasoningProvider } from './planner.js';
import { formatZodIssues, type ToolRegistry } from './tools/registry.js';
import type {
  AgentSession,
  AgentStep,
  FailureReason,
  QueryScope,
  SessionFailure,
  SessionStatus,
  StepObservation,
  ToolCallAction,
} from './types.js';

export type OrchestratorState = 'PLANNING' | 'ACTING' | 'OBSERVING' | 'DONE' | 'FAILED' | 'TRUNCATED';

const TERMINAL_STATES: ReadonlySet<OrchestratorState> = new Set(['DONE', 'FAILED', 'TRUNCATED']);

export interface OrchestratorLimits {
  /** Tool steps before the session is truncated */
  maxSteps: number;
  maxPlanRetries: number;
  /** Failed attempts per retryable tool, unless the tool sets maxRetries */
  maxToolRetries: number;
  planTimeoutMs: number;
  /** Per tool call, unless the tool sets timeoutMs */
  toolTimeoutMs: number;
  /** Initial delay between planning retries */
  retryBaseDelayMs: number;
}

export const DEFAULT_ORCHESTRATOR_LIMITS: OrchestratorLimits = {
  maxSteps: 6,
  maxPlanRetries: 2,
  maxToolRetries: 2,
  planTimeoutMs: 60_000,
  toolTimeoutMs: 30_000,
  retryBaseDelayMs: 250,
};

const OrchestratorLimitsSchema = z.object({
  maxSteps: z.number().int().min(1),
  maxPlanRetries: z.number().int().min(0),
  maxToolRetries: z.number().int().min(0),
  planTimeoutMs: z.number().finite().positive(),
  toolTimeoutMs: z.number().finite().positive(),
  retryBaseDelayMs: z.number().finite().min(0),
}) satisfies z.ZodType<OrchestratorLimits>;

/**
 * @throws ValidationError listing every limit out of range
 */
export function validateOrchestratorLimits(limits: OrchestratorLimits): OrchestratorLimits {
  const result = OrchestratorLimitsSchema.safeParse(limits);
  if (!result.success) {
    throw new ValidationError('Invalid orchestrator limits', formatZodIssues(result.error));
  }
  return result.data;
}

/**
 * Checks a per-run step limit. Undefined means "use the orchestrator's".
 *
 * @throws ValidationError unless undefined or an integer >= 1
 */
export function validateMaxSteps(maxSteps: number | undefined): void {
  if (maxSteps === undefined) {
    return;
  }
  const result = OrchestratorLimitsSchema.shape.maxSteps.safeParse(maxSteps);
  if (!result.success) {
    throw new ValidationError(
      'Invalid maxSteps',
      result.error.issues.map((issue) => `maxSteps: ${issue.message}`)
    );
  }
}

export interface OrchestratorOptions extends Partial<OrchestratorLimits> {
  planner: ReasoningProvider;
  tools: ToolRegistry;
  logger?: Logger;
  now?: () => Date;
  generateId?: () => string;
}

export interface RunOptions {
  /** Checked before every planning call; aborting ends the session as cancelled */
  signal?: AbortSignal;
  /** Steps to replay before planning continues */
  priorTrace?: readonly AgentStep[];
  scope?: QueryScope;
  sessionId?: string;
  /** Overrides the orchestrator's maxSteps for this run */
  maxSteps?: number;
  /** Called with each step as it is appended */
  onStep?: (step: AgentStep) => void;
  onStateChange?: (state: OrchestratorState) => void;
}

/**
 * Mutable state of one run. Never shared between runs.
 */
export interface RunContext {
  sessionId: string;
  query: string;
  scope: QueryScope;
  signal: AbortSignal | undefined;
  maxSteps: number;
  createdAt: string;
  trace: AgentStep[];
  /** Failed attempts per tool name */
  toolFailures: Map<string, number>;
  pendingAction: ToolCallAction | null;
  pendingObservation: StepObservation | null;
  previousError: string | null;
  finalAnswer: string | null;
  failure: SessionFailure | null;
  onStep?: (step: AgentStep) => void;
}

/** Longest serialized output quoted in a partial answer */
const MAX_PARTIAL_CHARS = 500;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function freezeStep(step: AgentStep): AgentStep {
  Object.freeze(step.action.arguments);
  Object.freeze(step.action);
  Object.freeze(step.observation);
  return Object.freeze(step);
}

function isPlanningRetryable(error: unknown): boolean {
  if (error instanceof ProviderError) {
    return error.retryable;
  }
  return error instanceof PlanningError || error instanceof TimeoutError;
}

/**
 * "[partial] ..." summary of the last successful observation, or null when
 * no step succeeded.
 */
export function summarizePartial(trace: readonly AgentStep[]): string | null {
  for (let i = trace.length - 1; i >= 0; i--) {
    const step = trace[i];
    if (step?.observation.status === 'succeeded') {
      const output = JSON.stringify(step.observation.output) ?? 'null';
      const quoted = output.length > MAX_PARTIAL_CHARS ? `${output.slice(0, MAX_PARTIAL_CHARS)}...` : output;
      return `[partial] Last result from ${step.action.tool}: ${quoted}`;
    }
  }
  return null;
}

export class AgentOrchestrator {
  private readonly planner: ReasoningProvider;
  private readonly tools: ToolRegistry;
  private readonly limits: OrchestratorLimits;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: OrchestratorOptions) {
    const { planner, tools, logger, now, generateId, ...limits } = options;
    this.planner = planner;
    this.tools = tools;
    const defaults = DEFAULT_ORCHESTRATOR_LIMITS;
    this.limits = validateOrchestratorLimits({
      maxSteps: limits.maxSteps ?? defaults.maxSteps,
      maxPlanRetries: limits.maxPlanRetries ?? defaults.maxPlanRetries,
      maxToolRetries: limits.maxToolRetries ?? defaults.maxToolRetries,
      planTimeoutMs: limits.planTimeoutMs ?? defaults.planTimeoutMs,
      toolTimeoutMs: limits.toolTimeoutMs ?? defaults.toolTimeoutMs,
      retryBaseDelayMs: limits.retryBaseDelayMs ?? defaults.retryBaseDelayMs,
    });
    this.logger = logger ?? silentLogger;
    this.now = now ?? (() => new Date());
    this.generateId = generateId ?? randomUUID;
  }

  /**
   * Run a query to a terminal session.
   *
   * Planning, tool and internal failures all end in a session with status
   * 'failed' and a failure reason. Only an invalid `maxSteps` rejects.
   */
  async run(query: string, options: RunOptions = {}): Promise<AgentSession> {
    validateMaxSteps(options.maxSteps);
    const context: RunContext = {
      sessionId: options.sessionId ?? this.generateId(),
      query,
      scope: options.scope ?? {},
      signal: options.signal,
      maxSteps: options.maxSteps ?? this.limits.maxSteps,
      createdAt: this.now().toISOString(),
      trace: [],
      toolFailures: new Map(),
      pendingAction: null,
      pendingObservation: null,
      previousError: null,
      finalAnswer: null,
      failure: null,
      onStep: options.onStep,
    };

    for (const step of options.priorTrace ?? []) {
      context.trace.push(freezeStep({ ...step, stepIndex: context.trace.length }));
      if (step.observation.status === 'failed') {
        context.toolFailures.set(step.action.tool, (context.toolFailures.get(step.action.tool) ?? 0) + 1);
      }
    }

    let state: OrchestratorState = 'PLANNING';
    try {
      while (!TERMINAL_STATES.has(state)) {
        options.onStateChange?.(state);
        state = await this.transition(state, context);
      }
    } catch (error) {
      this.logger.warn(`[Orchestrator] Session ${context.sessionId} hit an internal error: ${errorMessage(error)}`);
      context.failure = { reason: 'internal_error', message: errorMessage(error) };
      state = 'FAILED';
    }
    options.onStateChange?.(state);

    return this.finish(state, context);
  }

  /**
   * Execute one state and return the next.
   */
  async transition(state: OrchestratorState, context: RunContext): Promise<OrchestratorState> {
    switch (state) {
      case 'PLANNING':
        return this.plan(context);
      case 'ACTING':
        return this.act(context);
      case 'OBSERVING':
        return this.observe(context);
      case 'DONE':
      case 'FAILED':
      case 'TRUNCATED':
        return state;
    }
  }

  private fail(context: RunContext, reason: FailureReason, message: string): OrchestratorState {
    context.failure = { reason, message };
    return 'FAILED';
  }

  private async plan(context: RunContext): Promise<OrchestratorState> {
    if (context.signal?.aborted) {
      return this.fail(context, 'cancelled', 'Session cancelled');
    }
    if (context.trace.length >= context.maxSteps) {
      return 'TRUNCATED';
    }

    const tools = this.tools.list();
    const toolNames = this.tools.names;

    let attempts = 0;
    try {
      const action = await retryWithBackoff(
        async (attempt) => {
          attempts = attempt;
          const raw = await withTimeout(
            (signal) =>
              this.planner.plan(
                {
                  query: context.query,
                  trace: Object.freeze([...context.trace]),
                  tools,
                  previousError: context.previousError,
                },
                { signal }
              ),
            this.limits.planTimeoutMs,
            'Planning call',
            context.signal
          );
          return parsePlannedAction(raw, toolNames);
        },
        {
          retries: this.limits.maxPlanRetries,
          baseDelayMs: this.limits.retryBaseDelayMs,
          shouldRetry: (error) => !context.signal?.aborted && isPlanningRetryable(error),
          onRetry: (error, attempt) => {
            context.previousError = errorMessage(error);
            this.logger.debug?.(`[Orchestrator] Planning attempt ${attempt} failed: ${context.previousError}`);
          },
          signal: context.signal,
        }
      );

      context.previousError = null;
      if (action.type === 'final_answer') {
        context.finalAnswer = action.text;
        return 'DONE';
      }
      context.pendingAction = action;
      return 'ACTING';
    } catch (error) {
      if (context.signal?.aborted) {
        return this.fail(context, 'cancelled', 'Session cancelled');
      }
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      const reason: FailureReason = cause instanceof TimeoutError ? 'timeout' : 'planning_error';
      return this.fail(
        context,
        reason,
        `Planning failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${errorMessage(cause)}`
      );
    }
  }

  private async act(context: RunContext): Promise<OrchestratorState> {
    const action = context.pendingAction;
    if (!action) {
      throw new Error('ACTING without a planned tool call');
    }

    try {
      const output = await this.tools.invoke(action.name, action.arguments, {
        scope: context.scope,
        sessionId: context.sessionId,
        timeoutMs: this.limits.toolTimeoutMs,
      });
      context.pendingObservation = { status: 'succeeded', output };
    } catch (error) {
      context.pendingObservation = this.toFailedObservation(action.name, error);
    }
    return 'OBSERVING';
  }

  private toFailedObservation(toolName: string, error: unknown): StepObservation {
    const toolRetryable = this.tools.get(toolName)?.retryable ?? false;
    if (error instanceof TimeoutError) {
      return { status: 'failed', error: { reason: 'timeout', message: error.message, retryable: true } };
    }
    if (error instanceof ToolContractViolation) {
      return {
        status: 'failed',
        error: { reason: 'tool_contract_violation', message: error.message, retryable: toolRetryable },
      };
    }
    if (error instanceof ToolExecutionError) {
      return { status: 'failed', error: { reason: 'tool_error', message: error.message, retryable: toolRetryable } };
    }
    // Unknown tool or a registry bug: recorded, never retried
    return { status: 'failed', error: { reason: 'tool_error', message: errorMessage(error), retryable: false } };
  }

  private observe(context: RunContext): OrchestratorState {
    const action = context.pendingAction;
    const observation = context.pendingObservation;
    if (!action || !observation) {
      throw new Error('OBSERVING without a completed tool call');
    }
    context.pendingAction = null;
    context.pendingObservation = null;

    const step = freezeStep({
      stepIndex: context.trace.length,
      action: { tool: action.name, arguments: action.arguments },
      observation,
      timestamp: this.now().toISOString(),
    });
    context.trace.push(step);
    context.onStep?.(step);

    if (observation.status === 'succeeded') {
      return 'PLANNING';
    }

    const failures = (context.toolFailures.get(action.name) ?? 0) + 1;
    context.toolFailures.set(action.name, failures);
    const budget = this.tools.get(action.name)?.maxRetries ?? this.limits.maxToolRetries;

    if (observation.error.retryable && failures <= budget) {
      this.logger.debug?.(
        `[Orchestrator] ${action.name} failed (${failures}/${budget} retries used): ${observation.error.message}`
      );
      return 'PLANNING';
    }
    return this.fail(context, observation.error.reason, observation.error.message);
  }

  private finish(state: OrchestratorState, context: RunContext): AgentSession {
    const status: SessionStatus =
      state === 'DONE' ? 'succeeded' : state === 'TRUNCATED' ? 'truncated' : 'failed';

    let partialAnswer: string | null = null;
    if (status === 'truncated') {
      partialAnswer =
        summarizePartial(context.trace) ??
        `[partial] No tool produced a result within ${context.maxSteps} step${context.maxSteps === 1 ? '' : 's'}.`;
    } else if (status === 'failed') {
      partialAnswer = summarizePartial(context.trace);
    }

    return {
      id: context.sessionId,
      query: context.query,
      trace: Object.freeze([...context.trace]),
      status,
      finalAnswer: status === 'succeeded' ? context.finalAnswer : null,
      partialAnswer,
      failure: status === 'failed' ? context.failure : null,
      createdAt: context.createdAt,
      completedAt: this.now().toISOString(),
    };
  }
}

