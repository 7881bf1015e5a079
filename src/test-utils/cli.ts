/**
 * Helpers for command tests: a capturing CommandContext and a runner that
 * parses argv through a throwaway root program.
 */

import { Command } from 'commander';
import { vi } from 'vitest';

import type { CommandContext } from '../cli/types.js';

export interface CapturedContext {
  ctx: CommandContext;
  /** Lines passed to ctx.log */
  output: string[];
  warnings: string[];
}

export function createCapturingContext(options: { json?: boolean; verbose?: boolean } = {}): CapturedContext {
  const output: string[] = [];
  const warnings: string[] = [];
  return {
    output,
    warnings,
    ctx: {
      options: { json: options.json ?? false, verbose: options.verbose ?? false },
      log: (message) => output.push(message),
      debug: vi.fn(),
      warn: (message) => warnings.push(message),
      error: vi.fn(),
    },
  };
}

/**
 * Run a subcommand, e.g. `runCommand(createListCommand(get), ['list'])`.
 */
export async function runCommand(command: Command, args: string[]): Promise<void> {
  const program = new Command().exitOverride();
  program.addCommand(command);
  await program.parseAsync(['node', 'docent', ...args]);
}
