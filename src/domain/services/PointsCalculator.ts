import { CandidateTransaction } from '../entities/Transaction.js';
import { RewardMultiplier } from '../entities/RewardMultiplier.js';
import { amountToCents, roundCentsHalfEven } from './Money.js';

const autoWord = /\bAUTO\b/;
const payWord = /\bPAY\b/;
const autoPayWord = /\bAUTOPAY\b/;

export type MultiplierLookup = (category: string, card: string) => Promise<RewardMultiplier | null>;

export interface PointsResult {
  points: number | null;
  multiplierId: number | null;
}

const notApplicable: PointsResult = { points: null, multiplierId: null };

export const isAutoPayDescription = (description: string): boolean => {
  const upper = description.toUpperCase();
  return (autoWord.test(upper) && payWord.test(upper)) || autoPayWord.test(upper);
};

export const calculatePoints = async (
  transaction: CandidateTransaction,
  lookupMultiplier: MultiplierLookup,
): Promise<PointsResult> => {
  if (isAutoPayDescription(transaction.description)) {
    return notApplicable;
  }

  if (!transaction.category || !transaction.card) {
    return notApplicable;
  }

  const multiplier = await lookupMultiplier(transaction.category, transaction.card);
  if (!multiplier) {
    return notApplicable;
  }

  const wholeAmount = roundCentsHalfEven(amountToCents(transaction.amount));
  const points = wholeAmount * multiplier.multiplier || 0; // fold -0

  return { points, multiplierId: multiplier.id };
};
