/**
 * Tests for the remove command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import chalk from 'chalk';

vi.mock('../../../indexer/embedder/provider.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../indexer/embedder/provider.js')>()),
  createEmbeddingProvider: vi.fn(),
}));

import { createRemoveCommand } from '../remove.js';
import { createIngestionService, createRetrievalRuntime, type RetrievalRuntime } from '../../runtime.js';
import { createEmbeddingProvider } from '../../../indexer/embedder/provider.js';
import { setConfigValue } from '../../../config/index.js';
import { getDatabase } from '../../../database/index.js';
import { DocumentNotFoundError } from '../../../errors/index.js';
import { silentLogger } from '../../../utils/index.js';
import {
  createCapturingContext,
  FakeEmbeddingProvider,
  resetAll,
  runCommand,
} from '../../../test-utils/index.js';

describe('createRemoveCommand', () => {
  let home: string;
  let runtime: RetrievalRuntime;
  let documentId: string;

  beforeEach(async () => {
    chalk.level = 0;
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'docent-remove-'));
    vi.stubEnv('DOCENT_HOME', home);
    resetAll();
    setConfigValue('embedding.dimensions', '4');
    vi.mocked(createEmbeddingProvider).mockReturnValue(new FakeEmbeddingProvider({ dimensions: 4 }));

    runtime = await createRetrievalRuntime(silentLogger);
    const service = createIngestionService(runtime, silentLogger);
    documentId = (await service.ingestDocument('Invoice 42 is overdue.', 'memory://invoice')).documentId;
  });

  afterEach(() => {
    resetAll();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    fs.rmSync(home, { recursive: true, force: true });
  });

  it('removes the document, its chunks and its index entries', async () => {
    const { ctx, output } = createCapturingContext();

    await runCommand(createRemoveCommand(() => ctx), ['remove', documentId]);

    expect(output).toEqual([`✓ Removed ${documentId} (memory://invoice)`]);
    expect(getDatabase().getDocument(documentId)).toBeUndefined();
    expect(getDatabase().getStats()).toMatchObject({ documents: 0, chunks: 0, indexEntries: 0 });
    expect(runtime.index.size).toBe(0);
  });

  it('does not need an embedding provider', async () => {
    vi.mocked(createEmbeddingProvider).mockClear();
    const { ctx } = createCapturingContext();

    await runCommand(createRemoveCommand(() => ctx), ['rm', documentId]);

    expect(createEmbeddingProvider).not.toHaveBeenCalled();
  });

  it('reports the removal as JSON', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { ctx } = createCapturingContext({ json: true });

    await runCommand(createRemoveCommand(() => ctx), ['remove', documentId]);

    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual({
      removed: true,
      documentId,
      sourceUri: 'memory://invoice',
      entriesRemoved: 1,
    });
  });

  it('rejects an unknown id', async () => {
    const { ctx } = createCapturingContext();

    await expect(runCommand(createRemoveCommand(() => ctx), ['remove', 'no-such-doc'])).rejects.toBeInstanceOf(
      DocumentNotFoundError
    );
    expect(getDatabase().getStats().documents).toBe(1);
  });
});
