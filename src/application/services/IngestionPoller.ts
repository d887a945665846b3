import { setTimeout as sleep } from 'node:timers/promises';
import { InboxFileSystemPort } from '../ports/InboxFileSystemPort.js';
import { LoggerPort } from '../ports/LoggerPort.js';
import { FileLifecycleManager } from './FileLifecycleManager.js';

export interface PollCycleSummary {
  processed: number;
  failed: number;
  skipped: number;
  errored: number;
}

export class IngestionPoller {
  private controller: AbortController | null = null;

  constructor(
    private readonly files: InboxFileSystemPort,
    private readonly lifecycle: FileLifecycleManager,
    private readonly logger: LoggerPort,
    private readonly intervalMs: number,
  ) {}

  async runOnce(): Promise<PollCycleSummary> {
    const summary: PollCycleSummary = { processed: 0, failed: 0, skipped: 0, errored: 0 };
    const filenames = await this.files.listInbox();

    for (const filename of filenames) {
      try {
        const outcome = await this.lifecycle.process(filename);
        if (outcome.alreadyHandled) {
          summary.skipped += 1;
        } else if (outcome.state === 'ARCHIVED_PROCESSED') {
          summary.processed += 1;
        } else {
          summary.failed += 1;
        }
      } catch (error) {
        summary.errored += 1;
        this.logger.error(`⚠️ Could not archive ${filename}`, error);
      }
    }

    return summary;
  }

  /** Polls until stop() is called or the signal aborts. Cycles never overlap. */
  async start(signal?: AbortSignal): Promise<void> {
    if (this.controller) {
      throw new Error('Poller is already running');
    }

    const controller = new AbortController();
    this.controller = controller;
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    this.logger.info('📡 Watching for new CSV files in the inbox...');

    try {
      while (!controller.signal.aborted && !signal?.aborted) {
        try {
          await this.runOnce();
        } catch (error) {
          this.logger.error('⚠️ Poll cycle failed', error);
        }

        await sleep(this.intervalMs, undefined, { signal: controller.signal }).catch((error: unknown) => {
          if (!controller.signal.aborted) {
            throw error;
          }
        });
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.controller = null;
    }
  }

  stop(): void {
    this.controller?.abort();
  }
}
