/**
 * Status Command
 *
 * Displays storage statistics and provider setup:
 *   docent status         - Show system status
 *   docent status --json  - Output as JSON
 */

import { existsSync, statSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';

import type { ContextFactory } from '../types.js';
import { getDatabase } from '../../database/index.js';
import { getConfigPath, getDbPath, hasApiKey, loadConfig, type Config } from '../../config/index.js';

/**
 * Format bytes to human-readable size (e.g., "127.4 MB")
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(sizes.length - 1, Math.floor(Math.log(bytes) / Math.log(k)));

  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`;
}

function formatPath(filePath: string): string {
  const homeDir = process.env['HOME'] ?? process.env['USERPROFILE'] ?? '';
  if (homeDir && filePath.startsWith(homeDir)) {
    return '~' + filePath.slice(homeDir.length);
  }
  return filePath;
}

function getDbFileSize(dbPath: string): number {
  return existsSync(dbPath) ? statSync(dbPath).size : 0;
}

/**
 * Whether the provider can be used as configured. Ollama needs no key.
 */
function keyConfigured(provider: Config['llm']['provider']): boolean {
  return provider === 'ollama' || hasApiKey(provider);
}

export function createStatusCommand(getContext: ContextFactory): Command {
  return new Command('status')
    .description('Show storage statistics and provider setup')
    .action(() => {
      const ctx = getContext();
      ctx.debug('Fetching system status...');

      const stats = getDatabase().getStats();
      const config = loadConfig();
      const dbPath = getDbPath();
      const dbSize = getDbFileSize(dbPath);
      const configPath = getConfigPath();
      const llmReady = keyConfigured(config.llm.provider);
      const embeddingReady = keyConfigured(config.embedding.provider);

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              ...stats,
              database: { path: dbPath, size: dbSize },
              embedding: {
                provider: config.embedding.provider,
                model: config.embedding.model,
                dimensions: config.embedding.dimensions,
                keyConfigured: embeddingReady,
              },
              llm: { provider: config.llm.provider, model: config.llm.model, keyConfigured: llmReady },
              config: { path: configPath },
            },
            null,
            2
          )
        );
        return;
      }

      const mark = (ready: boolean): string => (ready ? chalk.green('✓') : chalk.red('✗ key missing'));
      const lines: string[] = [];
      lines.push(chalk.bold('Docent Status'));
      lines.push(chalk.dim('─'.repeat(35)));
      lines.push(`${chalk.cyan('Documents:')}    ${stats.documents.toLocaleString()}`);
      lines.push(`${chalk.cyan('Chunks:')}       ${stats.chunks.toLocaleString()}`);
      lines.push(`${chalk.cyan('Indexed:')}      ${stats.indexEntries.toLocaleString()}`);
      lines.push(`${chalk.cyan('Sessions:')}     ${stats.sessions.toLocaleString()}`);
      lines.push(`${chalk.cyan('Database:')}     ${formatBytes(dbSize)} (${formatPath(dbPath)})`);
      lines.push('');
      lines.push(
        `${chalk.cyan('Embeddings:')}   ${config.embedding.model} (${config.embedding.provider}, ${config.embedding.dimensions}d) ${mark(embeddingReady)}`
      );
      lines.push(`${chalk.cyan('LLM:')}          ${config.llm.model} (${config.llm.provider}) ${mark(llmReady)}`);
      lines.push(`${chalk.cyan('Config:')}       ${formatPath(configPath)}`);

      if (stats.documents === 0) {
        lines.push('');
        lines.push(chalk.yellow('No documents ingested.'));
        lines.push(`Run ${chalk.cyan('docent ingest <path>')} to get started.`);
      }

      ctx.log(lines.join('\n'));
    });
}
