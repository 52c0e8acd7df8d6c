import type { CalendarDate } from '@lkr-rates/core';
import type { Result } from 'neverthrow';
import { err } from 'neverthrow';

import { RateSourceError } from '../../core/errors.js';
import { buildCandidate } from '../../core/rate-validation.js';
import type { RateCandidate } from '../../core/types.js';

import type { HnbRateEntry, HnbResponse } from './schemas.js';

export function findHnbUsdEntry(response: HnbResponse): HnbRateEntry | undefined {
  return response.ex.find((entry) => entry.currency === 'US Dollars' || entry.currencyCode === 'USD');
}

/**
 * Convert the HNB payload into a candidate dated `today`
 */
export function transformHnbResponse(
  response: HnbResponse,
  today: CalendarDate
): Result<RateCandidate, RateSourceError> {
  const usd = findHnbUsdEntry(response);
  if (!usd) {
    const seen = response.ex
      .slice(0, 5)
      .map((entry) => entry.currencyCode ?? entry.currency ?? '?')
      .join(', ');
    return err(
      new RateSourceError('USD entry not found in HNB response', 'not-found', 'hnb', {
        expected: "ex[] entry with currency 'US Dollars' or currencyCode 'USD'",
        received: seen,
      })
    );
  }

  return buildCandidate(
    { buyRate: usd.buyingRate, date: today, sellRate: usd.sellingRate, source: 'HNB' },
    'hnb'
  );
}
