import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { CANONICAL_HEADERS } from '../../domain/entities/Transaction.js';
import { CanonicalSchemaError } from '../../domain/errors.js';

export interface CanonicalValidationResult {
  valid: boolean;
  headers: string[];
  missing: string[];
}

const HeaderRowSchema = z.array(z.array(z.string()));

export const normalizeHeader = (header: string): string => header.trim().toLowerCase();

export const readHeaders = (content: string): string[] => {
  const rows = HeaderRowSchema.parse(
    parse(content, {
      to_line: 1,
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    }),
  );

  return (rows[0] ?? []).map(normalizeHeader);
};

/**
 * Structural gate for normalizer output: the header row must name every
 * canonical field. Column order and extra columns do not matter.
 */
export class CanonicalCsvValidator {
  validate(content: string): CanonicalValidationResult {
    const headers = content.trim() ? readHeaders(content) : [];
    const present = new Set(headers);
    const missing = CANONICAL_HEADERS.filter((header) => !present.has(header));

    return { valid: missing.length === 0, headers, missing };
  }

  assertValid(content: string): void {
    const result = this.validate(content);
    if (!result.valid) {
      throw new CanonicalSchemaError(result.missing);
    }
  }
}
