/**
 * Remove Command
 *
 * Deletes a document with its chunks and index entries:
 *   docent remove <documentId>
 *   docent rm <documentId> --json
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { ContextFactory } from '../types.js';
import { openIndex } from '../runtime.js';
import { DocumentNotFoundError } from '../../errors/index.js';

export function createRemoveCommand(getContext: ContextFactory): Command {
  return new Command('remove')
    .alias('rm')
    .argument('<documentId>', 'Id of the document to remove (see: docent list)')
    .description('Remove a document and its index entries')
    .action(async (documentId: string) => {
      const ctx = getContext();
      // Removing needs the index but no embedding provider, so no API key
      const { database, index } = await openIndex(ctx);

      const document = database.getDocument(documentId);
      if (!document) {
        throw new DocumentNotFoundError(documentId);
      }

      const entriesRemoved = index.delete(documentId);
      database.deleteDocument(documentId);
      ctx.debug(`Removed ${entriesRemoved} index entries`);

      if (ctx.options.json) {
        console.log(JSON.stringify({ removed: true, documentId, sourceUri: document.sourceUri, entriesRemoved }));
        return;
      }
      ctx.log(`${chalk.green('✓')} Removed ${chalk.cyan(documentId)} ${chalk.dim(`(${document.sourceUri})`)}`);
    });
}
