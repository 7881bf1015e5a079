/**
 * AI SDK error translation shared by the embedding and LLM providers.
 */

import { APICallError } from 'ai';
import { ProviderError } from '../errors/index.js';

/**
 * Map an AI SDK error to ProviderError. The SDK marks 408/409/429 and 5xx
 * responses retryable; everything else it reports (auth, bad request,
 * unknown model) is not. Errors without a response (network failures) are
 * retryable.
 */
export function toProviderError(provider: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  if (APICallError.isInstance(error)) {
    return new ProviderError(provider, error.message, {
      retryable: error.isRetryable,
      statusCode: error.statusCode,
      cause: error,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError(provider, message, { cause: error });
}
