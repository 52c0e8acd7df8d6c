import { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

// LKR rates are quoted to four decimal places; 28 significant digits leaves ample headroom
Decimal.set({
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7,
  toExpPos: 21,
});

/**
 * Parse a stored decimal string. Falls back to zero for empty input.
 */
export function parseDecimal(value: string | Decimal | undefined | null): Decimal {
  if (value === undefined || value === null || value === '') {
    return new Decimal(0);
  }

  try {
    return new Decimal(value);
  } catch {
    return new Decimal(0);
  }
}

/**
 * Parse a rate quoted by an upstream (number, or string possibly carrying
 * thousands separators and whitespace). Rejects empty, non-numeric and
 * non-positive values.
 */
export function parsePositiveDecimal(value: unknown, fieldName = 'value'): Result<Decimal, Error> {
  let normalized: string;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return err(new Error(`Invalid ${fieldName}: ${value}`));
    }
    normalized = value.toString();
  } else if (typeof value === 'string') {
    normalized = value.replace(/,/g, '').trim();
  } else {
    return err(new Error(`Missing ${fieldName}`));
  }

  if (normalized === '') {
    return err(new Error(`Missing ${fieldName}`));
  }

  let decimal: Decimal;
  try {
    decimal = new Decimal(normalized);
  } catch {
    return err(new Error(`Invalid ${fieldName}: ${normalized}`));
  }

  if (decimal.isNaN() || !decimal.isFinite()) {
    return err(new Error(`Invalid ${fieldName}: ${normalized}`));
  }

  if (decimal.lessThanOrEqualTo(0)) {
    return err(new Error(`Non-positive ${fieldName}: ${decimal.toFixed()}`));
  }

  return ok(decimal);
}

/**
 * Format a rate for storage and display (four decimal places)
 */
export function formatRate(value: Decimal): string {
  return value.toFixed(4);
}
