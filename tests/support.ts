import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Mock, vi } from 'vitest';
import { RewardMultiplier } from '../src/domain/entities/RewardMultiplier.js';
import { LoggerPort } from '../src/application/ports/LoggerPort.js';

export const CANONICAL_HEADER = 'transaction_date,description,amount,category,card';

export const testMultipliers: RewardMultiplier[] = [
  { id: 1, category: 'Dining', card: 'amex', multiplier: 3 },
  { id: 2, category: 'Payment', card: 'amex', multiplier: 5 },
  { id: 3, category: 'Groceries', card: 'chase', multiplier: 2 },
];

export const fixedNow = () => new Date(2024, 2, 15, 9, 30, 5);

export interface TempLayout {
  root: string;
  inboxDir: string;
  processedDir: string;
  failedDir: string;
  logFile: string;
  cleanup: () => Promise<void>;
}

export const createTempLayout = async (): Promise<TempLayout> => {
  const root = await mkdtemp(path.join(os.tmpdir(), 'statement-inbox-'));
  const layout = {
    root,
    inboxDir: path.join(root, 'Incoming'),
    processedDir: path.join(root, 'Processed'),
    failedDir: path.join(root, 'Failed'),
    logFile: path.join(root, 'watcher_log.csv'),
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
  await mkdir(layout.inboxDir);
  await mkdir(layout.processedDir);
  await mkdir(layout.failedDir);
  return layout;
};

export const silentLogger: LoggerPort = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export const createTestLogger = (): { info: Mock; warn: Mock; error: Mock } => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});
