/**
 * Tests for the status command
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import chalk from 'chalk';

import { createStatusCommand, formatBytes } from '../status.js';
import { setConfigValue } from '../../../config/index.js';
import { createCapturingContext, resetAll, runCommand } from '../../../test-utils/index.js';

describe('formatBytes', () => {
  it('formats sizes', () => {
    expect(formatBytes(0)).toBe('0 Bytes');
    expect(formatBytes(512)).toBe('512 Bytes');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5 MB');
  });
});

describe('createStatusCommand', () => {
  let home: string;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    chalk.level = 0;
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'docent-status-'));
    vi.stubEnv('DOCENT_HOME', home);
    vi.stubEnv('ANTHROPIC_API_KEY', '');
    vi.stubEnv('OPENAI_API_KEY', '');
    resetAll();
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    resetAll();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    fs.rmSync(home, { recursive: true, force: true });
  });

  async function statusJson(): Promise<Record<string, unknown>> {
    const { ctx } = createCapturingContext({ json: true });
    await runCommand(createStatusCommand(() => ctx), ['status']);
    return JSON.parse(String(logSpy.mock.calls.at(-1)?.[0]));
  }

  it('reports empty storage and missing keys', async () => {
    const status = await statusJson();

    expect(status).toMatchObject({
      documents: 0,
      chunks: 0,
      indexEntries: 0,
      sessions: 0,
      database: { path: path.join(home, 'docent.db') },
      llm: { provider: 'anthropic', keyConfigured: false },
      embedding: { provider: 'openai', dimensions: 1536, keyConfigured: false },
      config: { path: path.join(home, 'config.toml') },
    });
  });

  it('treats ollama as configured without a key', async () => {
    setConfigValue('llm.provider', 'ollama');
    setConfigValue('embedding.provider', 'ollama');

    const status = await statusJson();

    expect(status).toMatchObject({
      llm: { provider: 'ollama', keyConfigured: true },
      embedding: { provider: 'ollama', keyConfigured: true },
    });
  });

  it('prints a summary with a hint for empty storage', async () => {
    const { ctx, output } = createCapturingContext();

    await runCommand(createStatusCommand(() => ctx), ['status']);

    const lines = (output[0] ?? '').split('\n');
    expect(lines[0]).toBe('Docent Status');
    expect(lines[2]).toBe('Documents:    0');
    expect(lines).toContain('LLM:          claude-sonnet-4-20250514 (anthropic) ✗ key missing');
    expect(lines.at(-1)).toBe('Run docent ingest <path> to get started.');
  });
});
