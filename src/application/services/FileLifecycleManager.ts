import dayjs from 'dayjs';
import {
  LifecycleEffect,
  LifecycleEvent,
  LifecycleSnapshot,
  LifecycleState,
  ImportSummary,
  advanceLifecycle,
  discover,
  fileStem,
} from '../../domain/services/FileLifecycle.js';
import { EventLogPort } from '../ports/EventLogPort.js';
import { InboxFileSystemPort } from '../ports/InboxFileSystemPort.js';
import { LoggerPort } from '../ports/LoggerPort.js';
import { NormalizerPort } from '../ports/NormalizerPort.js';
import { CanonicalCsvValidator } from './CanonicalCsvValidator.js';
import { TransactionImportService } from './TransactionImportService.js';

export interface FileLifecycleSettings {
  ownerId: string;
  now: () => Date;
}

export interface FileOutcome {
  filename: string;
  state: LifecycleState;
  alreadyHandled: boolean;
  message?: string;
  import?: ImportSummary;
}

export const processedOutputName = (filename: string, at: Date): string =>
  `${fileStem(filename)}_normalized_${dayjs(at).format('YYYYMMDDHHmmss')}.csv`;

export const rawArchiveName = (filename: string): string => `raw_${filename}`;

type StageEffect = Extract<LifecycleEffect, { kind: 'normalize' | 'proceed' | 'validate' }>;

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export class FileLifecycleManager {
  constructor(
    private readonly files: InboxFileSystemPort,
    private readonly normalizer: NormalizerPort,
    private readonly validator: CanonicalCsvValidator,
    private readonly importer: TransactionImportService,
    private readonly eventLog: EventLogPort,
    private readonly logger: LoggerPort,
    private readonly settings: FileLifecycleSettings,
  ) {}

  /**
   * Drives one inbox file to a terminal state. An error in any stage, the marker
   * check included, sends the file to the failed archive; only a failure of that
   * move itself escapes.
   */
  async process(filename: string): Promise<FileOutcome> {
    let snapshot = discover(filename);
    let event: LifecycleEvent;
    try {
      event = (await this.files.hasMarker(filename)) ? { type: 'MARKER_FOUND' } : { type: 'MARKER_ABSENT' };
    } catch (error) {
      event = { type: 'FAILED', message: errorMessage(error) };
    }

    for (;;) {
      const leaving = snapshot;
      const { snapshot: next, effect } = advanceLifecycle(leaving, event);
      snapshot = next;

      if (effect.kind === 'none') {
        return { filename, state: snapshot.state, alreadyHandled: true };
      }

      if (effect.kind === 'archiveFailed') {
        await this.archiveFailed(filename, effect.message);
        return { filename, state: snapshot.state, alreadyHandled: false, message: effect.message };
      }

      try {
        if (effect.kind === 'archiveProcessed') {
          await this.archiveProcessed(filename, effect.output, effect.summary);
          return { filename, state: snapshot.state, alreadyHandled: false, import: effect.summary };
        }

        event = await this.runStage(leaving, effect);
      } catch (error) {
        if (effect.kind === 'archiveProcessed') {
          snapshot = leaving;
        }
        event = { type: 'FAILED', message: errorMessage(error) };
      }
    }
  }

  private async runStage(from: LifecycleSnapshot, effect: StageEffect): Promise<LifecycleEvent> {
    switch (effect.kind) {
      case 'normalize': {
        const raw = await this.files.readInboxFile(from.filename);
        const output = await this.normalizer.normalize(raw, effect.cardLabel);
        return { type: 'NORMALIZED', output };
      }

      case 'proceed':
        return { type: 'PROCEED' };

      case 'validate': {
        this.validator.assertValid(effect.output);
        const rows = this.importer.parseCanonicalCsv(effect.output);
        const summary = await this.importer.importRows(rows, {
          ownerId: this.settings.ownerId,
          sourceFile: from.filename,
        });
        return { type: 'VALIDATED', summary };
      }
    }
  }

  /**
   * Rows are already committed when this runs. If the raw file cannot be
   * archived the normalized output is removed again and the file fails; a
   * re-dropped copy then imports nothing new, since every row is a duplicate.
   */
  private async archiveProcessed(filename: string, output: string, summary: ImportSummary): Promise<void> {
    const now = this.settings.now();
    const outputName = processedOutputName(filename, now);
    await this.files.writeProcessed(outputName, output);
    try {
      await this.files.moveToProcessed(filename, rawArchiveName(filename));
    } catch (error) {
      await this.files.removeProcessed(outputName);
      throw error;
    }
    await this.files.touchMarker(filename);
    await this.eventLog.append({ timestamp: now, filename, status: 'processed' });
    this.logger.info(`✅ Processed: ${filename} (${summary.added} added, ${summary.skipped} skipped)`);
  }

  private async archiveFailed(filename: string, message: string): Promise<void> {
    await this.files.moveToFailed(filename);
    await this.eventLog.append({ timestamp: this.settings.now(), filename, status: 'failed', message });
    this.logger.warn(`❌ Failed: ${filename} - ${message}`);
  }
}
