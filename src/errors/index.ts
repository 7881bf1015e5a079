/**
 * Error handling module
 *
 * Usage:
 *   import { InvalidDocumentError, handleError } from './errors/index.js';
 */

export {
  DocentError,
  FileNotFoundError,
  DocumentNotFoundError,
  SessionNotFoundError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  InvalidDocumentError,
  ProviderError,
  EmbeddingUnavailableError,
  PlanningError,
  ToolContractViolation,
  ToolExecutionError,
  TimeoutError,
  type ContractDirection,
} from './types.js';

export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
