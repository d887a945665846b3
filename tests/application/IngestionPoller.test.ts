import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NormalizationError } from '../../src/domain/errors.js';
import { CanonicalCsvValidator } from '../../src/application/services/CanonicalCsvValidator.js';
import { DeduplicationService } from '../../src/application/services/DeduplicationService.js';
import { FileLifecycleManager } from '../../src/application/services/FileLifecycleManager.js';
import { IngestionPoller } from '../../src/application/services/IngestionPoller.js';
import { TransactionImportService } from '../../src/application/services/TransactionImportService.js';
import { CsvEventLog } from '../../src/infrastructure/adapters/eventlog/CsvEventLog.js';
import { NodeInboxFileSystem } from '../../src/infrastructure/adapters/filesystem/NodeInboxFileSystem.js';
import { InMemoryTransactionStore } from '../../src/infrastructure/adapters/storage/InMemoryTransactionStore.js';
import { CANONICAL_HEADER, TempLayout, createTempLayout, createTestLogger, fixedNow, testMultipliers } from '../support.js';

const normalizedFor = (card: string) => `${CANONICAL_HEADER}\n2024-03-01,Grocer,10.00,Groceries,${card}\n`;

class BrokenFailedArchive extends NodeInboxFileSystem {
  async moveToFailed(): Promise<void> {
    throw new Error('EACCES: permission denied');
  }
}

describe('IngestionPoller', () => {
  let layout: TempLayout;
  let logger: ReturnType<typeof createTestLogger>;
  const normalize = vi.fn(async (_raw: string, card: string) => {
    if (card === 'citi') {
      throw new NormalizationError('Normalizer returned an empty response');
    }
    return normalizedFor(card);
  });

  const buildPoller = (files: NodeInboxFileSystem, intervalMs = 30_000) => {
    const lifecycle = new FileLifecycleManager(
      files,
      { normalize },
      new CanonicalCsvValidator(),
      new TransactionImportService(
        new InMemoryTransactionStore(testMultipliers, fixedNow),
        new CanonicalCsvValidator(),
        new DeduplicationService(),
      ),
      new CsvEventLog(layout.logFile),
      logger,
      { ownerId: 'household', now: fixedNow },
    );
    return new IngestionPoller(files, lifecycle, logger, intervalMs);
  };

  const drop = (name: string) => writeFile(path.join(layout.inboxDir, name), 'raw export\n');

  beforeEach(async () => {
    layout = await createTempLayout();
    logger = createTestLogger();
    normalize.mockClear();
  });

  afterEach(async () => {
    await layout.cleanup();
  });

  it('treats an empty inbox as a no-op cycle', async () => {
    const poller = buildPoller(new NodeInboxFileSystem(layout));
    await expect(poller.runOnce()).resolves.toEqual({ processed: 0, failed: 0, skipped: 0, errored: 0 });
    expect(normalize).not.toHaveBeenCalled();
  });

  it('processes csv files in filename order and keeps going past a failure', async () => {
    await drop('chase_march.csv');
    await drop('Citi_march.CSV');
    await drop('amex_march.csv');
    await writeFile(path.join(layout.inboxDir, 'notes.txt'), 'not a statement');

    const poller = buildPoller(new NodeInboxFileSystem(layout));
    const summary = await poller.runOnce();

    expect(summary).toEqual({ processed: 2, failed: 1, skipped: 0, errored: 0 });
    expect(normalize.mock.calls.map(([, card]) => card)).toEqual(['citi', 'amex', 'chase']);
  });

  it('skips files that already carry a completion marker on the next cycle', async () => {
    const poller = buildPoller(new NodeInboxFileSystem(layout));
    await drop('amex_march.csv');
    await poller.runOnce();

    await drop('amex_march.csv');
    await expect(poller.runOnce()).resolves.toEqual({ processed: 0, failed: 0, skipped: 1, errored: 0 });
    expect(normalize).toHaveBeenCalledTimes(1);
  });

  it('logs and counts a file whose failed-archive move breaks', async () => {
    await drop('citi_march.csv');
    await drop('amex_march.csv');

    const poller = buildPoller(new BrokenFailedArchive(layout));
    const summary = await poller.runOnce();

    expect(summary).toEqual({ processed: 1, failed: 0, skipped: 0, errored: 1 });
    expect(logger.error).toHaveBeenCalledWith('⚠️ Could not archive citi_march.csv', expect.any(Error));
  });

  it('polls repeatedly until stopped', async () => {
    const poller = buildPoller(new NodeInboxFileSystem(layout), 5);
    const runOnce = vi.spyOn(poller, 'runOnce').mockResolvedValue({ processed: 0, failed: 0, skipped: 0, errored: 0 });

    const running = poller.start();
    await vi.waitFor(() => expect(runOnce.mock.calls.length).toBeGreaterThanOrEqual(2));
    poller.stop();

    await expect(running).resolves.toBeUndefined();
    const calls = runOnce.mock.calls.length;
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(runOnce).toHaveBeenCalledTimes(calls);
  });

  it('does not start when the signal is already aborted', async () => {
    const poller = buildPoller(new NodeInboxFileSystem(layout), 5);
    const runOnce = vi.spyOn(poller, 'runOnce');

    await poller.start(AbortSignal.abort());

    expect(runOnce).not.toHaveBeenCalled();
  });

  it('keeps polling after a cycle throws', async () => {
    const poller = buildPoller(new NodeInboxFileSystem(layout), 5);
    const controller = new AbortController();
    const runOnce = vi
      .spyOn(poller, 'runOnce')
      .mockRejectedValueOnce(new Error('ENOENT: inbox missing'))
      .mockResolvedValue({ processed: 0, failed: 0, skipped: 0, errored: 0 });

    const running = poller.start(controller.signal);
    await vi.waitFor(() => expect(runOnce.mock.calls.length).toBeGreaterThanOrEqual(2));
    controller.abort();
    await running;

    expect(logger.error).toHaveBeenCalledWith('⚠️ Poll cycle failed', expect.any(Error));
  });

  it('refuses a second concurrent start', async () => {
    const poller = buildPoller(new NodeInboxFileSystem(layout), 5);
    vi.spyOn(poller, 'runOnce').mockResolvedValue({ processed: 0, failed: 0, skipped: 0, errored: 0 });

    const running = poller.start();
    await expect(poller.start()).rejects.toThrow('Poller is already running');
    poller.stop();
    await running;
  });
});
