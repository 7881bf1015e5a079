/**
 * Error type definitions for Docent
 *
 * Every error raised on purpose by the engine or the CLI extends
 * DocentError, which carries:
 * - a recovery hint shown to the user
 * - an exit code used by the CLI
 *
 * Exit codes:
 *   1  validation / general
 *   2  configuration
 *   3  missing file or document
 *   4  API key
 *   5  database
 *   6  invalid document
 *   7  provider / embedding
 *   8  planning
 *   9  tool contract / execution
 *   10 timeout
 */

/**
 * Base class for all Docent errors.
 */
export class DocentError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1, options?: { cause?: unknown }) {
    super(message, options);
    // Keeps instanceof working for subclasses after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'DocentError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when an input file doesn't exist.
 */
export class FileNotFoundError extends DocentError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown when a document id is not in the store.
 */
export class DocumentNotFoundError extends DocentError {
  constructor(documentId: string) {
    super(
      `Document not found: ${documentId}`,
      'Run: docent list  to see ingested documents',
      3
    );
    this.name = 'DocumentNotFoundError';
  }
}

/**
 * Thrown when a session id is neither running nor stored.
 */
export class SessionNotFoundError extends DocentError {
  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, 'Run: docent session  to list recent sessions', 3);
    this.name = 'SessionNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors (invalid TOML, bad values).
 */
export class ConfigError extends DocentError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: docent config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when a provider's API key is missing.
 */
export class APIKeyError extends DocentError {
  constructor(provider: string, envVar?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      `${provider} API key not configured`,
      `Set the ${envVarName} environment variable (or add it to .env)`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Wraps SQLite failures.
 */
export class DatabaseError extends DocentError {
  constructor(message: string, cause?: Error) {
    super(message, 'Run: docent status  to check database health', 5, { cause });
    this.name = 'DatabaseError';
  }
}

/**
 * Thrown when input validation fails, including programming-contract
 * violations at API boundaries (e.g. a non-positive `k`).
 */
export class ValidationError extends DocentError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

// ============================================================================
// Engine errors
// ============================================================================

/**
 * The document cannot be ingested (empty after normalization, undecodable
 * bytes, unsupported file). Never retried.
 */
export class InvalidDocumentError extends DocentError {
  constructor(message: string, public readonly sourceUri?: string) {
    super(
      sourceUri ? `${message} (${sourceUri})` : message,
      'Check that the document contains readable UTF-8 text',
      6
    );
    this.name = 'InvalidDocumentError';
  }
}

/**
 * A model provider (embedding or LLM) call failed.
 *
 * `retryable` is false for failures that repeating cannot fix,
 * such as rejected credentials.
 */
export class ProviderError extends DocentError {
  public readonly provider: string;
  public readonly retryable: boolean;
  public readonly statusCode?: number;

  constructor(
    provider: string,
    message: string,
    options: { retryable?: boolean; statusCode?: number; cause?: unknown } = {}
  ) {
    super(
      `${provider}: ${message}`,
      options.retryable === false
        ? 'Check the provider credentials and model name'
        : 'The provider may be temporarily unavailable; try again shortly',
      7,
      { cause: options.cause }
    );
    this.name = 'ProviderError';
    this.provider = provider;
    this.retryable = options.retryable ?? true;
    this.statusCode = options.statusCode;
  }
}

/**
 * The embedding provider stayed unreachable after every configured retry.
 */
export class EmbeddingUnavailableError extends DocentError {
  constructor(
    message: string,
    public readonly attempts: number,
    cause?: unknown
  ) {
    super(
      `${message} (after ${attempts} attempt${attempts === 1 ? '' : 's'})`,
      'Check the embedding provider (docent config get embedding.provider) and its API key',
      7,
      { cause }
    );
    this.name = 'EmbeddingUnavailableError';
  }
}

/**
 * The planner produced output that does not match the action schema.
 */
export class PlanningError extends DocentError {
  constructor(
    message: string,
    public readonly rawOutput?: string
  ) {
    super(message, 'Try rephrasing the question or use a more capable model', 8);
    this.name = 'PlanningError';
  }
}

export type ContractDirection = 'input' | 'output';

/**
 * Tool arguments or tool output failed schema validation.
 */
export class ToolContractViolation extends DocentError {
  public readonly tool: string;
  public readonly direction: ContractDirection;
  public readonly issues: string[];

  constructor(tool: string, direction: ContractDirection, issues: string[]) {
    super(
      `Tool "${tool}" ${direction} violates its schema: ${issues.join('; ')}`,
      undefined,
      9
    );
    this.name = 'ToolContractViolation';
    this.tool = tool;
    this.direction = direction;
    this.issues = issues;
  }
}

/**
 * A tool handler threw.
 */
export class ToolExecutionError extends DocentError {
  constructor(
    public readonly tool: string,
    message: string,
    cause?: unknown
  ) {
    super(`Tool "${tool}" failed: ${message}`, undefined, 9, { cause });
    this.name = 'ToolExecutionError';
  }
}

/**
 * An operation exceeded its time budget. Treated as retryable.
 */
export class TimeoutError extends DocentError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(
      `${operation} timed out after ${timeoutMs}ms`,
      'Increase the timeout in config.toml or try again',
      10
    );
    this.name = 'TimeoutError';
  }
}
