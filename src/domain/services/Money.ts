const decimalPattern = /^([+-])?(\d+)(?:\.(\d+))?$/;

/**
 * Parses a plain decimal ("-12.5", "4.50") into integer cents without going
 * through floating point. Digits past the second decimal round half away from zero.
 * Returns null for anything that is not a plain decimal.
 */
export const parseAmountToCents = (raw: string): number | null => {
  const match = decimalPattern.exec(raw.trim());
  if (!match) {
    return null;
  }

  const [, sign, whole, fraction = ''] = match;
  const padded = fraction.padEnd(3, '0');
  let cents = Number(whole) * 100 + Number(padded.slice(0, 2));

  if (Number(padded[2]) >= 5) {
    cents += 1;
  }

  if (!Number.isSafeInteger(cents)) {
    return null;
  }

  return sign === '-' && cents !== 0 ? -cents : cents;
};

export const centsToAmount = (cents: number): number => cents / 100;

export const amountToCents = (amount: number): number => Math.round(amount * 100);

/** Rounds a cent value to whole currency units, ties going to the even unit. */
export const roundCentsHalfEven = (cents: number): number => {
  const magnitude = Math.abs(cents);
  const units = Math.floor(magnitude / 100);
  const remainder = magnitude % 100;

  let rounded = units;
  if (remainder > 50 || (remainder === 50 && units % 2 === 1)) {
    rounded = units + 1;
  }

  return cents < 0 && rounded !== 0 ? -rounded : rounded;
};
