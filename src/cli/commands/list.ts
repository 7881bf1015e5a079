/**
 * List Command
 *
 * Displays all ingested documents:
 *   docent list          - Table of documents
 *   docent ls            - Alias for list
 *   docent list --json   - Output as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { ContextFactory } from '../types.js';
import { getDatabase } from '../../database/index.js';
import { formatTable, type Column } from '../../utils/table.js';

/**
 * Show file:// URIs as paths, with ~ for the home directory.
 */
export function formatSource(sourceUri: string, maxLength = 48): string {
  let display = sourceUri.startsWith('file://') ? decodeURIComponent(sourceUri.slice('file://'.length)) : sourceUri;

  const homeDir = process.env['HOME'] ?? process.env['USERPROFILE'] ?? '';
  if (homeDir && display.startsWith(homeDir)) {
    display = '~' + display.slice(homeDir.length);
  }

  if (display.length > maxLength) {
    return '...' + display.slice(-(maxLength - 3));
  }
  return display;
}

export function createListCommand(getContext: ContextFactory): Command {
  return new Command('list')
    .alias('ls')
    .description('List ingested documents')
    .action(() => {
      const ctx = getContext();
      const documents = getDatabase().listDocuments();
      ctx.debug(`Found ${documents.length} document(s)`);

      if (ctx.options.json) {
        console.log(JSON.stringify({ count: documents.length, documents }, null, 2));
        return;
      }

      if (documents.length === 0) {
        ctx.log(chalk.yellow('No documents ingested yet.'));
        ctx.log('');
        ctx.log(chalk.dim('Get started:'));
        ctx.log(`  ${chalk.cyan('docent ingest ~/path/to/statements')}`);
        return;
      }

      const columns: Column[] = [
        { header: 'ID', key: 'id' },
        { header: 'Source', key: 'source' },
        { header: 'Chunks', key: 'chunks', align: 'right' },
        { header: 'Tags', key: 'tags', maxWidth: 24 },
        { header: 'Added', key: 'added' },
      ];
      const rows = documents.map((d) => ({
        id: d.id,
        source: formatSource(d.sourceUri),
        chunks: d.chunkCount.toLocaleString(),
        tags: d.tags.join(', '),
        added: d.createdAt.slice(0, 10),
      }));

      ctx.log(formatTable(columns, rows));
      ctx.log('');
      ctx.log(chalk.dim(`${documents.length} document${documents.length === 1 ? '' : 's'} ingested`));
    });
}
