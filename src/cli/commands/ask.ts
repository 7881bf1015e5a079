/**
 * Ask Command
 *
 * Answers a question with the agent: it plans, calls tools (retrieval,
 * financial analysis, code generation) and stops with a grounded answer.
 *
 *   docent ask "What did we spend on travel in Q3?"
 *   docent ask "Any unusual invoices?" --document <id> --trace
 *   docent ask "Forecast next month" --max-steps 3 --json
 *
 * Ctrl+C cancels the session; the tool call in flight is allowed to finish.
 */

import { Command } from 'commander';

import type { ContextFactory } from '../types.js';
import { AskArgsSchema, AskOptionsSchema, collect, parseCommandInput } from '../validation.js';
import { createQueryService, createRetrievalRuntime } from '../runtime.js';
import { renderSession } from '../render.js';
import { startSpinner } from '../spinner.js';

interface AskCommandOptions {
  document?: string[];
  maxSteps?: string;
  trace?: boolean;
}

export function createAskCommand(getContext: ContextFactory): Command {
  return new Command('ask')
    .argument('<question>', 'Question to answer')
    .description('Answer a question from the ingested documents')
    .option('-d, --document <id>', 'Only use this document (repeatable)', collect)
    .option('--max-steps <n>', 'Tool steps before the answer is cut short')
    .option('--trace', 'Show every tool call', false)
    .action(async (question: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();
      const args = parseCommandInput(AskArgsSchema, { question });
      const options = parseCommandInput(AskOptionsSchema, cmdOptions);

      const runtime = await createRetrievalRuntime(ctx);
      const service = createQueryService(runtime, ctx);

      const spinner = startSpinner(ctx, 'Planning...');
      const controller = new AbortController();
      const onInterrupt = (): void => {
        if (spinner) spinner.text = 'Cancelling after the current step...';
        controller.abort();
      };
      process.once('SIGINT', onInterrupt);

      const session = await service
        .submitQuery(args.question, options.document, undefined, {
          signal: controller.signal,
          maxSteps: options.maxSteps,
          onStep: (step) => {
            ctx.debug(`Step ${step.stepIndex + 1}: ${step.action.tool} → ${step.observation.status}`);
            if (spinner) spinner.text = `Step ${step.stepIndex + 1}: ${step.action.tool}`;
          },
        })
        .finally(() => {
          process.removeListener('SIGINT', onInterrupt);
          spinner?.stop();
        });

      if (session.status === 'failed') {
        process.exitCode = 1;
      }

      if (ctx.options.json) {
        console.log(JSON.stringify(session, null, 2));
        return;
      }
      for (const line of renderSession(session, { trace: options.trace })) {
        ctx.log(line);
      }
    });
}
