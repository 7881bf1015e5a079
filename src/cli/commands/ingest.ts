/**
 * Ingest Command
 *
 * Adds documents to the knowledge base:
 *   docent ingest notes.md                 Ingest one file
 *   docent ingest ./statements --tag 2024  Ingest a directory, tagged
 *   docent ingest a.txt b.csv --json       Machine-readable results
 *
 * Directories are scanned for files with an allowed extension
 * (ingestion.allowed_extensions), skipping dotfiles, dependency folders and
 * .gitignore'd paths. Up to ingestion.concurrency files are ingested at
 * once. Each file succeeds or fails on its own; identical content is
 * reported as a duplicate and stored once.
 */

import { stat } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';

import type { ContextFactory } from '../types.js';
import { collect, IngestOptionsSchema, parseCommandInput } from '../validation.js';
import { createIngestionService, createRetrievalRuntime } from '../runtime.js';
import { startSpinner } from '../spinner.js';
import { loadConfig } from '../../config/index.js';
import { ValidationError } from '../../errors/index.js';
import { scanDirectory } from '../../indexer/index.js';
import { mapWithConcurrency } from '../../utils/index.js';

interface IngestCommandOptions {
  tag?: string[];
}

export interface IngestFileResult {
  path: string;
  status: 'ingested' | 'duplicate' | 'failed';
  documentId?: string;
  chunkCount?: number;
  error?: string;
}

/**
 * Expand directories into the files beneath them with an allowed
 * extension. Plain paths pass through untouched so that missing files
 * are reported by the ingestion itself.
 */
export async function expandPaths(paths: readonly string[], allowedExtensions: readonly string[]): Promise<string[]> {
  const files: string[] = [];
  for (const path of paths) {
    const absolute = resolve(path);
    const info = await stat(absolute).catch(() => null);
    if (!info?.isDirectory()) {
      files.push(absolute);
      continue;
    }
    files.push(...(await scanDirectory(absolute, { extensions: allowedExtensions })));
  }
  return [...new Set(files)];
}

export function createIngestCommand(getContext: ContextFactory): Command {
  return new Command('ingest')
    .argument('<paths...>', 'Files or directories to ingest')
    .description('Ingest documents into the knowledge base')
    .option('-t, --tag <tag>', 'Tag the ingested documents (repeatable)', collect)
    .action(async (paths: string[], cmdOptions: IngestCommandOptions) => {
      const ctx = getContext();
      const { tag: tags } = parseCommandInput(IngestOptionsSchema, cmdOptions);

      const config = loadConfig();
      const files = await expandPaths(paths, config.ingestion.allowed_extensions);
      if (files.length === 0) {
        throw new ValidationError('No files to ingest', [
          `Directories are searched for: ${config.ingestion.allowed_extensions.join(', ')}`,
        ]);
      }
      ctx.debug(`Ingesting ${files.length} file(s)${tags ? ` tagged ${tags.join(', ')}` : ''}`);

      const runtime = await createRetrievalRuntime(ctx, config);
      const service = createIngestionService(runtime, ctx);

      const spinner = startSpinner(ctx, 'Ingesting...');
      let done = 0;
      const results = await mapWithConcurrency(
        files,
        config.ingestion.concurrency,
        async (file): Promise<IngestFileResult> => {
          try {
            const result = await service.ingestFile(file, { tags });
            return {
              path: file,
              status: result.created ? 'ingested' : 'duplicate',
              documentId: result.documentId,
              chunkCount: result.chunkCount,
            };
          } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            ctx.debug(`${file}: ${message}`);
            return { path: file, status: 'failed', error: message };
          } finally {
            done++;
            if (spinner) spinner.text = `[${done}/${files.length}] ${basename(file)}`;
          }
        }
      );
      spinner?.stop();

      const count = (status: IngestFileResult['status']): number =>
        results.filter((r) => r.status === status).length;
      const failed = count('failed');
      if (failed > 0) {
        process.exitCode = 1;
      }

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            { ingested: count('ingested'), duplicates: count('duplicate'), failed, results },
            null,
            2
          )
        );
        return;
      }

      for (const result of results) {
        if (result.status === 'ingested') {
          ctx.log(`${chalk.green('✓')} ${result.path} ${chalk.dim(`(${result.chunkCount} chunks, ${result.documentId})`)}`);
        } else if (result.status === 'duplicate') {
          ctx.log(`${chalk.yellow('=')} ${result.path} ${chalk.dim(`(already ingested as ${result.documentId})`)}`);
        } else {
          ctx.log(`${chalk.red('✗')} ${result.path}: ${result.error}`);
        }
      }
      ctx.log('');
      ctx.log(
        chalk.dim(`${count('ingested')} ingested, ${count('duplicate')} duplicate, ${failed} failed`)
      );
    });
}
