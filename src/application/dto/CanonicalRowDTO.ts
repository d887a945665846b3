import dayjs from 'dayjs';
import { z } from 'zod';
import { centsToAmount, parseAmountToCents } from '../../domain/services/Money.js';

const isoDate = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'transaction_date must be YYYY-MM-DD')
  .refine((value) => dayjs(value).isValid() && dayjs(value).format('YYYY-MM-DD') === value, {
    message: 'transaction_date is not a calendar date',
  });

const requiredText = (field: string) => z.string().trim().min(1, `${field} is required`);

const amount = z
  .union([z.string(), z.number()])
  .transform((value, ctx) => {
    const cents = parseAmountToCents(String(value));
    if (cents === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `amount "${value}" is not a plain decimal` });
      return z.NEVER;
    }
    return centsToAmount(cents);
  });

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

/** One canonical CSV row, keyed by the lowercased header names. */
export const CanonicalRowSchema = z
  .object({
    transaction_date: isoDate,
    description: requiredText('description'),
    amount,
    category: optionalText,
    card: requiredText('card'),
  })
  .transform((row) => ({
    transactionDate: row.transaction_date,
    description: row.description,
    amount: row.amount,
    category: row.category,
    card: row.card,
  }));

export type CanonicalRowDTO = z.output<typeof CanonicalRowSchema>;

export const CreateTransactionSchema = z
  .object({
    transactionDate: isoDate,
    description: requiredText('description'),
    amount,
    category: optionalText,
    card: requiredText('card'),
  });

export const formatZodIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');
