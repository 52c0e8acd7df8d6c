import { parsePositiveDecimal, type CalendarDate } from '@lkr-rates/core';
import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { RateSourceError } from './errors.js';
import type { RateCandidate, RateSource } from './types.js';

export function nearestDateNote(date: CalendarDate): string {
  return `Rate from ${date} (nearest available date)`;
}

function isUsableRate(value: Decimal): boolean {
  return value.isFinite() && value.greaterThan(0);
}

/**
 * Reject candidates that must never reach storage
 */
export function validateCandidate(candidate: RateCandidate, provider: string): Result<RateCandidate, RateSourceError> {
  if (!isUsableRate(candidate.buyRate) || !isUsableRate(candidate.sellRate)) {
    return err(
      new RateSourceError(
        `Invalid rates for ${candidate.date}: buy=${candidate.buyRate.toString()}, sell=${candidate.sellRate.toString()}`,
        'validation',
        provider,
        { expected: 'buy and sell rates > 0' }
      )
    );
  }

  return ok(candidate);
}

/**
 * Build a candidate from raw upstream values
 */
export function buildCandidate(
  params: {
    buyRate: unknown;
    date: CalendarDate;
    note?: string | undefined;
    sellRate: unknown;
    source: RateSource;
  },
  provider: string
): Result<RateCandidate, RateSourceError> {
  const buyRate = parsePositiveDecimal(params.buyRate, 'buy rate');
  if (buyRate.isErr()) {
    return err(new RateSourceError(buyRate.error.message, 'validation', provider));
  }

  const sellRate = parsePositiveDecimal(params.sellRate, 'sell rate');
  if (sellRate.isErr()) {
    return err(new RateSourceError(sellRate.error.message, 'validation', provider));
  }

  const candidate: RateCandidate = {
    buyRate: buyRate.value,
    date: params.date,
    sellRate: sellRate.value,
    source: params.source,
  };
  if (params.note !== undefined) {
    candidate.note = params.note;
  }

  return ok(candidate);
}
