/**
 * Docent CLI Entry Point
 *
 * This is the main entry point for the `docent` command.
 * It sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { ContextFactory, GlobalOptions } from './types.js';
import { createContext } from './context.js';
import { createAskCommand } from './commands/ask.js';
import { createConfigCommand } from './commands/config.js';
import { createIngestCommand } from './commands/ingest.js';
import { createListCommand } from './commands/list.js';
import { createRemoveCommand } from './commands/remove.js';
import { createSearchCommand } from './commands/search.js';
import { createSessionCommand } from './commands/session.js';
import { createStatusCommand } from './commands/status.js';
import { handleError, createGlobalErrorHandler, ConfigError, ValidationError } from '../errors/index.js';
import {
  loadConfig,
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
} from '../config/index.js';

// Version injected at build time via tsup define
const VERSION = process.env.CLI_VERSION ?? '0.0.0';

const program = new Command();

program
  .name('docent')
  .description('Ask questions about your documents - ingestion, retrieval and a tool-using agent')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('docent ingest ./statements --tag 2024')}    Ingest a directory of documents
  ${chalk.cyan('docent ask "What did we spend on travel?"')} Answer a question with the agent
  ${chalk.cyan('docent search "late payment fee"')}        Find similar chunks
  ${chalk.cyan('docent list')}                             List ingested documents
  ${chalk.cyan('docent session <id>')}                     Show a stored trace
  ${chalk.cyan('docent config set retrieval.top_k 8')}     Change a setting
`);

/**
 * Commander stores global options on the root command after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext: ContextFactory = () => createContext(getGlobalOptions());

program.addCommand(createIngestCommand(getContext));
program.addCommand(createAskCommand(getContext));
program.addCommand(createSearchCommand(getContext));
program.addCommand(createListCommand(getContext));
program.addCommand(createRemoveCommand(getContext));
program.addCommand(createSessionCommand(getContext));
program.addCommand(createStatusCommand(getContext));
program.addCommand(createConfigCommand(getContext));

program.on('command:*', (operands: string[]) => {
  throw new ValidationError(`Unknown command: ${operands[0] ?? ''}`, ['Run: docent --help  to see available commands']);
});

// Check API keys before commands that call a provider
program.hook('preAction', (_thisCommand, actionCommand) => {
  const validationOptions = getValidationOptionsForCommand(actionCommand.name());
  if (validationOptions.skipLLM && validationOptions.skipEmbedding) {
    return;
  }

  const result = validateStartupConfig(loadConfig(), validationOptions);
  if (!result.valid) {
    if (!getGlobalOptions().json) {
      printStartupValidation(result);
    }
    throw new ConfigError('Provider configuration is incomplete', result.hints.join('\n'));
  }
});

async function main(): Promise<void> {
  const errorOptions = (): GlobalOptions => getGlobalOptions();

  // Errors that escape every try/catch
  const globalHandler = createGlobalErrorHandler(errorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, errorOptions());
  }
}

void main();
