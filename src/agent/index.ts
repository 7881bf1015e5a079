/**
 * Agent Module
 *
 * Answers questions with a bounded plan/act/observe loop over the tool
 * registry.
 *
 * @example
 * ```typescript
 * const tools = createDefaultToolRegistry({ retriever, generator });
 * const orchestrator = new AgentOrchestrator({
 *   planner: new LlmReasoningProvider(generator),
 *   tools,
 *   maxSteps: config.agent.max_steps,
 * });
 * const queries = new QueryService({ orchestrator, store: getDatabase() });
 *
 * const session = await queries.submitQuery('What did we spend on travel in Q3?');
 * console.log(session.finalAnswer ?? session.partialAnswer);
 * ```
 *
 * @packageDocumentation
 */

export {
  AgentOrchestrator,
  DEFAULT_ORCHESTRATOR_LIMITS,
  summarizePartial,
  validateMaxSteps,
  validateOrchestratorLimits,
  type OrchestratorState,
  type OrchestratorLimits,
  type OrchestratorOptions,
  type RunOptions,
  type RunContext,
} from './orchestrator.js';

export {
  LlmReasoningProvider,
  parsePlannedAction,
  buildPlannerPrompt,
  PLANNER_SYSTEM_PROMPT,
  type ReasoningProvider,
  type PlannerInput,
  type PlanCallOptions,
} from './planner.js';

export {
  QueryService,
  type QueryServiceOptions,
  type QueryOptions,
  type SessionHandle,
  type SessionStore,
} from './query-service.js';

export * from './tools/index.js';

export {
  AgentActionSchema,
  ToolCallActionSchema,
  FinalAnswerActionSchema,
  StepActionSchema,
  StepObservationSchema,
  StepFailureReasonSchema,
  FailureReasonSchema,
  type AgentAction,
  type ToolCallAction,
  type FinalAnswerAction,
  type AgentStep,
  type StepAction,
  type StepObservation,
  type StepFailureReason,
  type AgentSession,
  type SessionStatus,
  type SessionFailure,
  type FailureReason,
  type QueryScope,
} from './types.js';
