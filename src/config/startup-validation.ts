/**
 * Startup Configuration Validation
 *
 * Checks, before a command runs, that the providers it will use have their
 * API keys. Commands that need neither an LLM nor embeddings skip this.
 */

import chalk from 'chalk';

import { hasApiKey } from './env.js';
import type { Config } from './schema.js';

export interface StartupValidationResult {
  valid: boolean;
  errors: string[];
  /** Setup instructions, one per error */
  hints: string[];
}

export interface StartupValidationOptions {
  /** Skip LLM provider checks (command makes no planning or generation calls) */
  skipLLM?: boolean;
  /** Skip embedding provider checks (command embeds nothing) */
  skipEmbedding?: boolean;
}

/**
 * Commands that call the LLM.
 */
export const COMMANDS_REQUIRING_LLM = ['ask'];

/**
 * Commands that embed text (documents or queries).
 */
export const COMMANDS_REQUIRING_EMBEDDING = ['ingest', 'ask', 'search'];

export function getValidationOptionsForCommand(command: string): StartupValidationOptions {
  return {
    skipLLM: !COMMANDS_REQUIRING_LLM.includes(command),
    skipEmbedding: !COMMANDS_REQUIRING_EMBEDDING.includes(command),
  };
}

/**
 * Validate the configured providers' keys. Returns problems rather than
 * throwing so callers can print all of them at once.
 */
export function validateStartupConfig(
  config: Pick<Config, 'llm' | 'embedding'>,
  options: StartupValidationOptions = {}
): StartupValidationResult {
  const errors: string[] = [];
  const hints: string[] = [];

  if (!options.skipLLM) {
    const provider = config.llm.provider;
    if (provider === 'anthropic' && !hasApiKey('anthropic')) {
      errors.push('Anthropic API key not set (llm.provider = "anthropic")');
      hints.push('Set ANTHROPIC_API_KEY in your environment or a .env file');
    } else if (provider === 'openai' && !hasApiKey('openai')) {
      errors.push('OpenAI API key not set (llm.provider = "openai")');
      hints.push('Set OPENAI_API_KEY in your environment or a .env file');
    }
  }

  if (!options.skipEmbedding && config.embedding.provider === 'openai' && !hasApiKey('openai')) {
    errors.push('OpenAI API key not set (embedding.provider = "openai")');
    hints.push('Set OPENAI_API_KEY, or run: docent config set embedding.provider ollama');
  }

  return { valid: errors.length === 0, errors, hints };
}

/**
 * Print validation errors and their hints to stderr.
 */
export function printStartupValidation(result: StartupValidationResult): void {
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error}`));
  }
  for (const hint of result.hints) {
    console.error(chalk.dim(`  ${hint}`));
  }
}
