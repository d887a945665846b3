import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { CandidateTransaction, Transaction } from '../../domain/entities/Transaction.js';
import { DuplicateTransactionError, RowParseError } from '../../domain/errors.js';
import { ImportSummary } from '../../domain/services/FileLifecycle.js';
import { calculatePoints } from '../../domain/services/PointsCalculator.js';
import { CanonicalRowDTO, CanonicalRowSchema, formatZodIssues } from '../dto/CanonicalRowDTO.js';
import { TransactionStorePort, TransactionStoreSession } from '../ports/TransactionStorePort.js';
import { CanonicalCsvValidator, normalizeHeader } from './CanonicalCsvValidator.js';
import { DeduplicationService } from './DeduplicationService.js';

export interface ImportOptions {
  ownerId: string;
  sourceFile?: string;
}

const RecordsSchema = z.array(z.record(z.string(), z.unknown()));

export class TransactionImportService {
  constructor(
    private readonly store: TransactionStorePort,
    private readonly validator: CanonicalCsvValidator,
    private readonly deduplicator: DeduplicationService,
  ) {}

  /** Parses every data row of a canonical CSV; one bad row rejects the whole document. */
  parseCanonicalCsv(content: string): CanonicalRowDTO[] {
    const records = RecordsSchema.parse(
      parse(content, {
        columns: (headers: string[]) => headers.map(normalizeHeader),
        bom: true,
        trim: true,
        skip_empty_lines: true,
        relax_column_count: true,
      }),
    );

    return records.map((record, index) => {
      const parsed = CanonicalRowSchema.safeParse(record);
      if (!parsed.success) {
        throw new RowParseError(index + 1, formatZodIssues(parsed.error));
      }
      return parsed.data;
    });
  }

  async importRows(rows: CandidateTransaction[], options: ImportOptions): Promise<ImportSummary> {
    return this.store.transaction(async (session) => {
      let added = 0;
      let skipped = 0;

      for (const row of rows) {
        const inserted = await this.insertUnlessDuplicate(session, row, options);
        if (inserted) {
          added += 1;
        } else {
          skipped += 1;
        }
      }

      return { added, skipped };
    });
  }

  async importCsv(content: string, options: ImportOptions): Promise<ImportSummary> {
    this.validator.assertValid(content);
    const rows = this.parseCanonicalCsv(content);
    return this.importRows(rows, options);
  }

  async createTransaction(candidate: CandidateTransaction, ownerId: string): Promise<Transaction> {
    return this.store.transaction(async (session) => {
      const inserted = await this.insertUnlessDuplicate(session, candidate, { ownerId });
      if (!inserted) {
        throw new DuplicateTransactionError();
      }
      return inserted;
    });
  }

  private async insertUnlessDuplicate(
    session: TransactionStoreSession,
    candidate: CandidateTransaction,
    options: ImportOptions,
  ): Promise<Transaction | null> {
    if (await this.deduplicator.isDuplicate(candidate, session)) {
      return null;
    }

    const { points, multiplierId } = await calculatePoints(candidate, (category, card) =>
      session.findMultiplier(category, card),
    );

    return session.insertTransaction({
      transactionDate: candidate.transactionDate,
      description: candidate.description,
      amount: candidate.amount,
      category: candidate.category,
      card: candidate.card,
      ownerId: options.ownerId,
      points,
      multiplierId,
      sourceFile: options.sourceFile,
    });
  }
}
