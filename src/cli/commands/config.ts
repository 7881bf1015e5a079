/**
 * Config Command
 *
 * Manages ~/.docent/config.toml:
 *   docent config get <key>          - Get a specific value
 *   docent config set <key> <value>  - Set a value
 *   docent config list               - Show all configuration
 *   docent config path               - Show config file location
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { ContextFactory } from '../types.js';
import { getConfigPath, getConfigValue, listConfig, setConfigValue } from '../../config/index.js';
import { ConfigError } from '../../errors/index.js';

/**
 * Format a value for display
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

export function createConfigCommand(getContext: ContextFactory): Command {
  const configCmd = new Command('config').description('Manage configuration settings');

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., docent config get embedding.model)')
    .action((key: string) => {
      const ctx = getContext();
      const value = getConfigValue(key);
      if (value === undefined) {
        throw new ConfigError(`Unknown config key: ${key}`, 'Run: docent config list  to see all keys');
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value }));
      } else {
        ctx.log(formatValue(value));
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., docent config set retrieval.top_k 8)')
    .action((key: string, value: string) => {
      const ctx = getContext();
      if (getConfigValue(key) === undefined) {
        throw new ConfigError(`Unknown config key: ${key}`, 'Run: docent config list  to see all keys');
      }
      setConfigValue(key, value);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, key, value: getConfigValue(key) }));
      } else {
        ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
      }
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig();

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));
      ctx.log('');
      // Blank line between sections
      let currentGroup = '';
      for (const [key, value] of entries) {
        const group = key.split('.')[0] ?? '';
        if (group !== currentGroup) {
          if (currentGroup !== '') ctx.log('');
          currentGroup = group;
        }
        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
      }
      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();
      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  return configCmd;
}
