export interface LedgerSummaryDTO {
  totalSpent: number;
  totalPoints: number;
}
