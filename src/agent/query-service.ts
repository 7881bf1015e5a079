/**
 * Query Service
 *
 * Entry point for answering questions. Each query becomes an AgentSession
 * run by the shared orchestrator; finished sessions are persisted
 * best-effort so `docent session <id>` can show them later.
 */

import { randomUUID } from 'node:crypto';

import type { DatabaseOperations } from '../database/operations.js';
import { ValidationError } from '../errors/index.js';
import type { IndexFilter } from '../search/types.js';
import { silentLogger, type Logger } from '../utils/index.js';
import { validateMaxSteps, type AgentOrchestrator } from './orchestrator.js';
import type { AgentSession, AgentStep, SessionStatus } from './types.js';

export type SessionStore = Pick<DatabaseOperations, 'saveSession' | 'getSession'>;

export interface QueryServiceOptions {
  orchestrator: AgentOrchestrator;
  store?: SessionStore;
  /** agent.persist_sessions (default true) */
  persistSessions?: boolean;
  logger?: Logger;
  generateId?: () => string;
  now?: () => Date;
}

export interface QueryOptions {
  signal?: AbortSignal;
  /** Overrides agent.max_steps */
  maxSteps?: number;
  /** Replay these steps before planning continues */
  priorTrace?: readonly AgentStep[];
  onStep?: (step: AgentStep) => void;
}

/**
 * A running (or finished) session.
 */
export interface SessionHandle {
  readonly id: string;
  status(): SessionStatus;
  /** Current state; the trace grows while the session runs */
  snapshot(): AgentSession;
  /**
   * Stop scheduling further steps. An in-flight tool call completes or
   * times out; the session then ends failed with reason 'cancelled'.
   */
  cancel(): void;
  /** Resolves with the terminal session; never rejects */
  readonly result: Promise<AgentSession>;
}

/** Finished sessions kept in memory when they could not be persisted */
const MAX_UNSTORED_SESSIONS = 100;

export class QueryService {
  private readonly orchestrator: AgentOrchestrator;
  private readonly store: SessionStore | undefined;
  private readonly persistSessions: boolean;
  private readonly logger: Logger;
  private readonly generateId: () => string;
  private readonly now: () => Date;

  private readonly running = new Map<string, SessionHandle>();
  private readonly unstored = new Map<string, AgentSession>();

  constructor(options: QueryServiceOptions) {
    this.orchestrator = options.orchestrator;
    this.store = options.store;
    this.persistSessions = options.persistSessions ?? true;
    this.logger = options.logger ?? silentLogger;
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Answer a question and wait for the terminal session.
   *
   * @throws ValidationError for an empty question
   */
  submitQuery(
    text: string,
    documentIds?: string[],
    filters?: IndexFilter,
    options: QueryOptions = {}
  ): Promise<AgentSession> {
    return this.startQuery(text, documentIds, filters, options).result;
  }

  /**
   * Start answering a question and return a pollable handle.
   *
   * @throws ValidationError for an empty question or an invalid maxSteps
   */
  startQuery(
    text: string,
    documentIds?: string[],
    filters?: IndexFilter,
    options: QueryOptions = {}
  ): SessionHandle {
    const query = text.trim();
    if (query.length === 0) {
      throw new ValidationError('Query must not be empty');
    }
    if (documentIds?.some((id) => id.trim().length === 0)) {
      throw new ValidationError('Document ids must not be empty');
    }
    validateMaxSteps(options.maxSteps);

    const id = this.generateId();
    const createdAt = this.now().toISOString();
    const controller = new AbortController();
    const external = options.signal;
    const onExternalAbort = (): void => controller.abort(external?.reason);
    if (external?.aborted) {
      controller.abort(external.reason);
    } else {
      external?.addEventListener('abort', onExternalAbort, { once: true });
    }

    const trace: AgentStep[] = [...(options.priorTrace ?? [])];
    let finished: AgentSession | null = null;

    const result = this.orchestrator
      .run(query, {
        sessionId: id,
        signal: controller.signal,
        scope: { documentIds, filters },
        maxSteps: options.maxSteps,
        priorTrace: options.priorTrace,
        onStep: (step) => {
          trace.push(step);
          options.onStep?.(step);
        },
      })
      .then((session) => {
        finished = session;
        external?.removeEventListener('abort', onExternalAbort);
        this.running.delete(id);
        this.persist(session);
        return session;
      });

    const handle: SessionHandle = {
      id,
      status: () => finished?.status ?? 'running',
      snapshot: () =>
        finished ?? {
          id,
          query,
          trace: [...trace],
          status: 'running',
          finalAnswer: null,
          partialAnswer: null,
          failure: null,
          createdAt,
          completedAt: null,
        },
      cancel: () => controller.abort(),
      result,
    };
    this.running.set(id, handle);
    return handle;
  }

  /**
   * Snapshot of a running session, or a finished one from the store.
   */
  getSession(id: string): AgentSession | undefined {
    const live = this.running.get(id);
    if (live) {
      return live.snapshot();
    }
    return this.unstored.get(id) ?? this.store?.getSession(id);
  }

  /** Handles of sessions still running */
  get activeSessions(): SessionHandle[] {
    return [...this.running.values()];
  }

  private persist(session: AgentSession): void {
    if (this.persistSessions && this.store) {
      try {
        this.store.saveSession(session);
        return;
      } catch (error) {
        this.logger.warn(
          `[QueryService] Could not store session ${session.id}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
    this.unstored.set(session.id, session);
    if (this.unstored.size > MAX_UNSTORED_SESSIONS) {
      const oldest = this.unstored.keys().next();
      if (!oldest.done) {
        this.unstored.delete(oldest.value);
      }
    }
  }
}
