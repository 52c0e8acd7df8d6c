import type { CalendarDate } from '@lkr-rates/core';
import type { Result } from 'neverthrow';
import { err } from 'neverthrow';

import { RateSourceError } from '../../core/errors.js';
import { buildCandidate } from '../../core/rate-validation.js';
import type { RateCandidate } from '../../core/types.js';

import type { SampathRateEntry, SampathResponse } from './schemas.js';

export function findSampathUsdEntry(response: SampathResponse): SampathRateEntry | undefined {
  return response.data.find((entry) => entry.CurrCode === 'USD');
}

export function transformSampathResponse(
  response: SampathResponse,
  today: CalendarDate
): Result<RateCandidate, RateSourceError> {
  if (response.success !== true) {
    return err(
      new RateSourceError('Sampath API returned success=false', 'parse', 'sampath', {
        expected: 'success: true',
        received: `success: ${String(response.success)}`,
      })
    );
  }

  const usd = findSampathUsdEntry(response);
  if (!usd) {
    return err(
      new RateSourceError('USD entry not found in Sampath response', 'not-found', 'sampath', {
        expected: "data[] entry with CurrCode 'USD'",
        received: response.data
          .slice(0, 5)
          .map((entry) => entry.CurrCode ?? '?')
          .join(', '),
      })
    );
  }

  return buildCandidate({ buyRate: usd.TTBUY, date: today, sellRate: usd.TTSEL, source: 'SAMPATH' }, 'sampath');
}
