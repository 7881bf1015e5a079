/**
 * Utilities Module
 */

export { formatTable, type Column, type Alignment, type Row } from './table.js';
export { safeJsonParse, extractJsonObject } from './json.js';
export { consoleLogger, silentLogger, type Logger } from './logger.js';
export {
  sleep,
  withTimeout,
  retryWithBackoff,
  backoffDelay,
  RetryExhaustedError,
  type RetryOptions,
} from './retry.js';
export { mapWithConcurrency } from './concurrency.js';
