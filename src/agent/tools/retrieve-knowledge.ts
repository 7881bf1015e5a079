/**
 * retrieve_knowledge: semantic search over ingested documents, restricted
 * to the session's scope.
 */

import { z } from 'zod';

import type { Retriever } from '../../search/retriever.js';
import type { IndexFilter } from '../../search/types.js';
import type { QueryScope } from '../types.js';
import { defineTool } from './types.js';

export type KnowledgeRetriever = Pick<Retriever, 'retrieve'>;

/**
 * Combine a session scope into one index filter. Explicit documentIds
 * replace any documentIds in the filters.
 */
export function scopeToFilter(scope: QueryScope): IndexFilter | undefined {
  const filter: IndexFilter = { ...scope.filters };
  if (scope.documentIds && scope.documentIds.length > 0) {
    filter.documentIds = scope.documentIds;
  }
  return Object.keys(filter).length > 0 ? filter : undefined;
}

export const retrieveKnowledgeInput = z.object({
  query: z
    .string()
    .trim()
    .min(1)
    .describe('Search query; be specific, e.g. "office rent payments in March"'),
  k: z.number().int().min(1).max(20).optional().describe('Number of passages (default from config)'),
});

export const retrieveKnowledgeOutput = z.object({
  results: z.array(
    z.object({
      chunkId: z.string(),
      documentId: z.string(),
      page: z.number().int(),
      score: z.number().min(0).max(1),
      text: z.string(),
    })
  ),
});

export interface RetrieveKnowledgeToolOptions {
  /** Used when the call gives no k */
  defaultK?: number;
}

export function createRetrieveKnowledgeTool(
  retriever: KnowledgeRetriever,
  options: RetrieveKnowledgeToolOptions = {}
) {
  return defineTool({
    name: 'retrieve_knowledge',
    description:
      'Search the ingested documents for passages relevant to a query. ' +
      'Use it before answering any question about document contents; cite what it returns.',
    inputSchema: retrieveKnowledgeInput,
    outputSchema: retrieveKnowledgeOutput,
    retryable: true,
    handler: async ({ query, k }, context) => {
      const results = await retriever.retrieve(query, k ?? options.defaultK ?? 5, scopeToFilter(context.scope), {
        signal: context.signal,
      });
      return {
        results: results.map(({ chunk, score }) => ({
          chunkId: chunk.id,
          documentId: chunk.documentId,
          page: chunk.page,
          score,
          text: chunk.text,
        })),
      };
    },
  });
}
