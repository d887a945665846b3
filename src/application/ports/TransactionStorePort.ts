import { RewardMultiplier } from '../../domain/entities/RewardMultiplier.js';
import { NaturalKey, NewTransaction, Transaction } from '../../domain/entities/Transaction.js';

export interface TransactionStoreSession {
  insertTransaction(transaction: NewTransaction): Promise<Transaction>;
  findByNaturalKey(key: NaturalKey): Promise<Transaction | null>;
  findMultiplier(category: string, card: string): Promise<RewardMultiplier | null>;
}

export interface TransactionStorePort extends TransactionStoreSession {
  /** Runs `work` in one transaction; a thrown error rolls back every write made through the session. */
  transaction<T>(work: (session: TransactionStoreSession) => Promise<T>): Promise<T>;
  listTransactions(ownerId: string, params: { skip: number; limit: number }): Promise<Transaction[]>;
  listMultipliers(): Promise<RewardMultiplier[]>;
}
