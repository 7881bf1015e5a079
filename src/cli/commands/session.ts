/**
 * Session Command
 *
 * Shows stored agent sessions:
 *   docent session          - Recent sessions
 *   docent session <id>     - One session with its full trace
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { ContextFactory } from '../types.js';
import { renderSession } from '../render.js';
import { getDatabase } from '../../database/index.js';
import { SessionNotFoundError } from '../../errors/index.js';
import { formatTable, type Column } from '../../utils/table.js';
import { parseCommandInput, SessionOptionsSchema } from '../validation.js';

interface SessionCommandOptions {
  limit: string;
}

export function createSessionCommand(getContext: ContextFactory): Command {
  return new Command('session')
    .argument('[id]', 'Session id (omit to list recent sessions)')
    .description('Show a stored session trace, or list recent sessions')
    .option('-n, --limit <n>', 'Sessions to list', '20')
    .action((id: string | undefined, cmdOptions: SessionCommandOptions) => {
      const ctx = getContext();
      const { limit } = parseCommandInput(SessionOptionsSchema, cmdOptions);
      const database = getDatabase();

      if (id !== undefined) {
        const session = database.getSession(id);
        if (!session) {
          throw new SessionNotFoundError(id);
        }
        if (ctx.options.json) {
          console.log(JSON.stringify(session, null, 2));
          return;
        }
        ctx.log(chalk.bold(session.query));
        ctx.log('');
        for (const line of renderSession(session, { trace: true })) {
          ctx.log(line);
        }
        return;
      }

      const sessions = database.listSessions(limit);
      if (ctx.options.json) {
        console.log(JSON.stringify({ count: sessions.length, sessions }, null, 2));
        return;
      }
      if (sessions.length === 0) {
        ctx.log(chalk.yellow('No sessions stored yet.'));
        return;
      }

      const columns: Column[] = [
        { header: 'ID', key: 'id' },
        { header: 'Query', key: 'query', maxWidth: 40 },
        { header: 'Status', key: 'status' },
        { header: 'Steps', key: 'steps', align: 'right' },
        { header: 'Started', key: 'started' },
      ];
      ctx.log(
        formatTable(
          columns,
          sessions.map((s) => ({
            id: s.id,
            query: s.query,
            status: s.status,
            steps: s.stepCount,
            started: s.createdAt.replace('T', ' ').slice(0, 19),
          }))
        )
      );
    });
}
