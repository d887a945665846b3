export interface RewardMultiplier {
  id: number;
  category: string;
  card: string;
  multiplier: number;
}
