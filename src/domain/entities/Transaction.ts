export const CANONICAL_HEADERS = ['transaction_date', 'description', 'amount', 'category', 'card'] as const;

export interface CandidateTransaction {
  transactionDate: string; // ISO date
  description: string;
  amount: number; // 2 fractional digits
  category?: string;
  card: string;
}

export interface Transaction extends CandidateTransaction {
  id: number;
  ownerId: string;
  points: number | null;
  multiplierId: number | null;
  sourceFile?: string;
  createdAt: string; // ISO timestamp
}

export type NewTransaction = Omit<Transaction, 'id' | 'createdAt'>;

export interface NaturalKey {
  transactionDate: string;
  description: string;
  amount: number;
  card: string;
}
