import { CanonicalCsvValidator } from '../../application/services/CanonicalCsvValidator.js';
import { DeduplicationService } from '../../application/services/DeduplicationService.js';
import { FileLifecycleManager } from '../../application/services/FileLifecycleManager.js';
import { IngestionPoller } from '../../application/services/IngestionPoller.js';
import { LedgerService } from '../../application/services/LedgerService.js';
import { TransactionImportService } from '../../application/services/TransactionImportService.js';
import { EventLogPort } from '../../application/ports/EventLogPort.js';
import { InboxFileSystemPort } from '../../application/ports/InboxFileSystemPort.js';
import { LoggerPort } from '../../application/ports/LoggerPort.js';
import { NormalizerPort } from '../../application/ports/NormalizerPort.js';
import { TransactionStorePort } from '../../application/ports/TransactionStorePort.js';
import { CsvEventLog } from '../adapters/eventlog/CsvEventLog.js';
import { NodeInboxFileSystem } from '../adapters/filesystem/NodeInboxFileSystem.js';
import {
  OpenAICompatibleNormalizer,
  createChatClient,
} from '../adapters/normalizer/OpenAICompatibleNormalizer.js';
import { InMemoryTransactionStore } from '../adapters/storage/InMemoryTransactionStore.js';
import { AppConfig, loadConfig } from '../config/Config.js';
import { loadMultipliers } from '../config/MultiplierSeed.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  store?: TransactionStorePort;
  normalizer?: NormalizerPort;
  files?: InboxFileSystemPort;
  eventLog?: EventLogPort;
  logger?: LoggerPort;
  now?: () => Date;
}

export class AppContainer {
  readonly config: AppConfig;
  readonly logger: LoggerPort;

  readonly store: TransactionStorePort;
  readonly normalizer: NormalizerPort;
  readonly files: InboxFileSystemPort;
  readonly eventLog: EventLogPort;
  readonly validator: CanonicalCsvValidator;
  readonly deduplicator: DeduplicationService;
  readonly importService: TransactionImportService;
  readonly ledgerService: LedgerService;
  readonly lifecycle: FileLifecycleManager;
  readonly poller: IngestionPoller;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    this.logger = overrides.logger ?? console;
    const now = overrides.now ?? (() => new Date());
    const { watcher, normalizer, store } = this.config;

    this.store = overrides.store ?? new InMemoryTransactionStore(loadMultipliers(store.multipliersFile), now);
    this.normalizer =
      overrides.normalizer ?? new OpenAICompatibleNormalizer(createChatClient(normalizer), normalizer.model);
    this.files = overrides.files ?? new NodeInboxFileSystem(watcher);
    this.eventLog = overrides.eventLog ?? new CsvEventLog(watcher.logFile);

    this.validator = new CanonicalCsvValidator();
    this.deduplicator = new DeduplicationService();
    this.importService = new TransactionImportService(this.store, this.validator, this.deduplicator);
    this.ledgerService = new LedgerService(this.store);

    this.lifecycle = new FileLifecycleManager(
      this.files,
      this.normalizer,
      this.validator,
      this.importService,
      this.eventLog,
      this.logger,
      { ownerId: watcher.ownerId, now },
    );
    this.poller = new IngestionPoller(this.files, this.lifecycle, this.logger, watcher.pollIntervalMs);
  }

  /** Creates the inbox, archive directories and the event log if they are missing. */
  async prepare(): Promise<void> {
    await this.files.ensureLayout();
    await this.eventLog.ensureExists();
  }
}
