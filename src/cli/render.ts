/**
 * Human-readable rendering of agent sessions, shared by `ask` and
 * `session`.
 */

import chalk from 'chalk';

import type { AgentSession, AgentStep } from '../agent/index.js';

const ARGUMENT_PREVIEW_LENGTH = 120;

function preview(value: unknown, max: number): string {
  const text = JSON.stringify(value) ?? 'undefined';
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

/**
 * One step as two lines: the call, then its outcome.
 */
export function renderStep(step: AgentStep): string[] {
  const call = `${step.stepIndex + 1}. ${chalk.cyan(step.action.tool)} ${chalk.dim(
    preview(step.action.arguments, ARGUMENT_PREVIEW_LENGTH)
  )}`;
  const outcome =
    step.observation.status === 'succeeded'
      ? `   ${chalk.green('✓')} ${preview(step.observation.output, ARGUMENT_PREVIEW_LENGTH)}`
      : `   ${chalk.red('✗')} ${step.observation.error.reason}: ${step.observation.error.message}`;
  return [call, outcome];
}

export function renderSession(session: AgentSession, options: { trace?: boolean } = {}): string[] {
  const lines: string[] = [];

  switch (session.status) {
    case 'succeeded':
      lines.push(session.finalAnswer ?? '');
      break;
    case 'truncated':
      lines.push(chalk.yellow(`Stopped after ${session.trace.length} step(s) without a final answer.`));
      break;
    case 'failed':
      if (session.failure) {
        lines.push(chalk.red(`Failed (${session.failure.reason}): ${session.failure.message}`));
      }
      break;
    case 'running':
      lines.push(chalk.yellow('Still running.'));
      break;
  }
  if (session.partialAnswer) {
    lines.push(session.partialAnswer);
  }

  if (options.trace) {
    lines.push('', chalk.bold('Trace:'));
    if (session.trace.length === 0) {
      lines.push(chalk.dim('(no tool calls)'));
    }
    for (const step of session.trace) {
      lines.push(...renderStep(step));
    }
  }

  lines.push('', chalk.dim(`Session ${session.id} · ${session.status} · ${session.trace.length} step(s)`));
  return lines;
}
