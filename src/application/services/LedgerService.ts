import { RewardMultiplier } from '../../domain/entities/RewardMultiplier.js';
import { Transaction } from '../../domain/entities/Transaction.js';
import { amountToCents } from '../../domain/services/Money.js';
import { LedgerSummaryDTO } from '../dto/LedgerSummaryDTO.js';
import { TransactionStorePort } from '../ports/TransactionStorePort.js';

const PAGE_LIMIT_MAX = 500;

export class LedgerService {
  constructor(private readonly store: TransactionStorePort) {}

  async listTransactions(ownerId: string, params: { skip?: number; limit?: number } = {}): Promise<Transaction[]> {
    const skip = Math.max(0, params.skip ?? 0);
    const limit = Math.min(PAGE_LIMIT_MAX, Math.max(0, params.limit ?? 100));
    return this.store.listTransactions(ownerId, { skip, limit });
  }

  async summarize(ownerId: string): Promise<LedgerSummaryDTO> {
    const transactions = await this.store.listTransactions(ownerId, { skip: 0, limit: Number.MAX_SAFE_INTEGER });

    // sum in cents to keep two-decimal totals exact
    let spentCents = 0;
    let pointsCents = 0;
    for (const txn of transactions) {
      spentCents += amountToCents(txn.amount);
      pointsCents += amountToCents(txn.points ?? 0);
    }

    return { totalSpent: spentCents / 100, totalPoints: pointsCents / 100 };
  }

  async listMultipliers(): Promise<RewardMultiplier[]> {
    return this.store.listMultipliers();
  }
}
