import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { RewardMultiplier } from '../../domain/entities/RewardMultiplier.js';

export const RewardMultiplierSchema = z.object({
  id: z.number().int().positive(),
  category: z.string().trim().min(1),
  card: z.string().trim().min(1),
  multiplier: z.number().int().min(0),
});

export const parseMultipliers = (input: unknown): RewardMultiplier[] => z.array(RewardMultiplierSchema).parse(input);

export const loadMultipliers = (file: string): RewardMultiplier[] => {
  const parsed: unknown = JSON.parse(readFileSync(file, 'utf8'));
  return parseMultipliers(parsed);
};
