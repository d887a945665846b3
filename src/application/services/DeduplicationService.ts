import { CandidateTransaction, NaturalKey } from '../../domain/entities/Transaction.js';
import { TransactionStoreSession } from '../ports/TransactionStorePort.js';

export const naturalKeyOf = (candidate: CandidateTransaction): NaturalKey => ({
  transactionDate: candidate.transactionDate,
  description: candidate.description,
  amount: candidate.amount,
  card: candidate.card,
});

/** Natural key is (date, description, amount, card); category and points are not part of it. */
export class DeduplicationService {
  async isDuplicate(candidate: CandidateTransaction, session: TransactionStoreSession): Promise<boolean> {
    const existing = await session.findByNaturalKey(naturalKeyOf(candidate));
    return existing !== null;
  }
}
