import { RewardMultiplier } from '../../../domain/entities/RewardMultiplier.js';
import { NaturalKey, NewTransaction, Transaction } from '../../../domain/entities/Transaction.js';
import { TransactionStorePort, TransactionStoreSession } from '../../../application/ports/TransactionStorePort.js';

const naturalKeyString = (key: NaturalKey): string =>
  [key.transactionDate, key.description, key.amount.toFixed(2), key.card].join('|');

const multiplierKey = (category: string, card: string): string => `${category}|${card}`;

export class InMemoryTransactionStore implements TransactionStorePort {
  private transactions = new Map<number, Transaction>();
  private byNaturalKey = new Map<string, number>();
  private readonly multipliers = new Map<string, RewardMultiplier>();
  private nextId = 1;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    multipliers: RewardMultiplier[] = [],
    private readonly now: () => Date = () => new Date(),
  ) {
    for (const multiplier of multipliers) {
      const key = multiplierKey(multiplier.category, multiplier.card);
      if (this.multipliers.has(key)) {
        throw new Error(`Duplicate multiplier for (${multiplier.category}, ${multiplier.card})`);
      }
      this.multipliers.set(key, multiplier);
    }
  }

  /** Transactions run one at a time; a failed one restores the previous rows. */
  transaction<T>(work: (session: TransactionStoreSession) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const saved = {
        transactions: new Map(this.transactions),
        byNaturalKey: new Map(this.byNaturalKey),
        nextId: this.nextId,
      };

      try {
        return await work(this);
      } catch (error) {
        this.transactions = saved.transactions;
        this.byNaturalKey = saved.byNaturalKey;
        this.nextId = saved.nextId;
        throw error;
      }
    };

    const result = this.queue.then(run, run);
    this.queue = result.catch(() => undefined);
    return result;
  }

  async insertTransaction(transaction: NewTransaction): Promise<Transaction> {
    const key = naturalKeyString(transaction);
    if (this.byNaturalKey.has(key)) {
      throw new Error(`Unique constraint violated for transaction ${key}`);
    }

    const stored: Transaction = {
      ...transaction,
      id: this.nextId++,
      createdAt: this.now().toISOString(),
    };

    this.transactions.set(stored.id, stored);
    this.byNaturalKey.set(key, stored.id);
    return stored;
  }

  async findByNaturalKey(key: NaturalKey): Promise<Transaction | null> {
    const id = this.byNaturalKey.get(naturalKeyString(key));
    return id === undefined ? null : this.transactions.get(id) ?? null;
  }

  async findMultiplier(category: string, card: string): Promise<RewardMultiplier | null> {
    return this.multipliers.get(multiplierKey(category, card)) ?? null;
  }

  async listTransactions(ownerId: string, params: { skip: number; limit: number }): Promise<Transaction[]> {
    return Array.from(this.transactions.values())
      .filter((txn) => txn.ownerId === ownerId)
      .sort((a, b) => b.transactionDate.localeCompare(a.transactionDate) || b.id - a.id)
      .slice(params.skip, params.skip + params.limit);
  }

  async listMultipliers(): Promise<RewardMultiplier[]> {
    return Array.from(this.multipliers.values()).sort((a, b) => a.id - b.id);
  }
}
