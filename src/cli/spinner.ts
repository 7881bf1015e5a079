import ora, { type Ora } from 'ora';

import type { CommandContext } from './types.js';

/**
 * Start an ora spinner, or return null when output is JSON or not a
 * terminal (spinners would corrupt piped output).
 */
export function startSpinner(ctx: CommandContext, text: string): Ora | null {
  if (ctx.options.json || !process.stdout.isTTY) {
    return null;
  }
  return ora({ text }).start();
}
