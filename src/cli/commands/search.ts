/**
 * Search Command
 *
 * Semantic search over ingested chunks, without the agent:
 *   docent search "late payment fee"
 *   docent search "rent" -k 10 --document <id> --json
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { ContextFactory } from '../types.js';
import { collect, parseCommandInput, SearchArgsSchema, SearchOptionsSchema } from '../validation.js';
import { createRetrievalRuntime } from '../runtime.js';
import { startSpinner } from '../spinner.js';

const PREVIEW_LENGTH = 200;

interface SearchCommandOptions {
  k?: string;
  document?: string[];
}

/**
 * Collapse whitespace and cut to `max` characters.
 */
export function previewText(text: string, max = PREVIEW_LENGTH): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max - 1)}…` : flat;
}

export function createSearchCommand(getContext: ContextFactory): Command {
  return new Command('search')
    .argument('<query>', 'Text to search for')
    .description('Find the chunks most similar to a query')
    .option('-k <n>', 'Number of results (defaults to retrieval.top_k)')
    .option('-d, --document <id>', 'Only search this document (repeatable)', collect)
    .action(async (query: string, cmdOptions: SearchCommandOptions) => {
      const ctx = getContext();
      const args = parseCommandInput(SearchArgsSchema, { query });
      const options = parseCommandInput(SearchOptionsSchema, cmdOptions);

      const runtime = await createRetrievalRuntime(ctx);
      const k = options.k ?? runtime.config.retrieval.top_k;
      const filters = options.document ? { documentIds: options.document } : undefined;

      const spinner = startSpinner(ctx, 'Searching...');
      const results = await runtime.retriever
        .retrieve(args.query, k, filters)
        .finally(() => spinner?.stop());

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              query: args.query,
              k,
              results: results.map(({ chunk, score }) => ({
                chunkId: chunk.id,
                documentId: chunk.documentId,
                page: chunk.page,
                score,
                text: chunk.text,
              })),
            },
            null,
            2
          )
        );
        return;
      }

      if (results.length === 0) {
        ctx.log(chalk.yellow('No matching chunks.'));
        return;
      }
      results.forEach(({ chunk, score }, i) => {
        ctx.log(`${i + 1}. ${chalk.green(score.toFixed(3))} ${chalk.cyan(chunk.documentId)} p.${chunk.page}`);
        ctx.log(`   ${chalk.dim(previewText(chunk.text))}`);
      });
    });
}
