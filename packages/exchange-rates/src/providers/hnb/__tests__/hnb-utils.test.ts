import { describe, expect, it } from 'vitest';

import { day } from '../../../__tests__/test-helpers.js';
import { findHnbUsdEntry, transformHnbResponse } from '../hnb-utils.js';
import { HnbResponseSchema, type HnbResponse } from '../schemas.js';

const today = day('2025-11-21');

describe('findHnbUsdEntry', () => {
  it('matches on the currency name', () => {
    const response: HnbResponse = { ex: [{ currency: 'Euro' }, { buyingRate: 300, currency: 'US Dollars' }] };

    expect(findHnbUsdEntry(response)?.buyingRate).toBe(300);
  });

  it('matches on the currency code', () => {
    const response: HnbResponse = { ex: [{ currencyCode: 'GBP' }, { buyingRate: 301, currencyCode: 'USD' }] };

    expect(findHnbUsdEntry(response)?.buyingRate).toBe(301);
  });
});

describe('transformHnbResponse', () => {
  it('builds a candidate dated today from numeric strings', () => {
    const response = HnbResponseSchema.parse({
      ex: [
        { buyingRate: '402.10', currency: 'Pound Sterling', currencyCode: 'GBP', sellingRate: '418.55' },
        {
          buyingRate: '302.75',
          currency: 'US Dollars',
          currencyCode: 'USD',
          sellingRate: '310.25',
          updated_on: '2025-11-21 09:00',
        },
      ],
    });

    const candidate = transformHnbResponse(response, today)._unsafeUnwrap();

    expect(candidate.date).toBe('2025-11-21');
    expect(candidate.buyRate.toFixed(2)).toBe('302.75');
    expect(candidate.sellRate.toFixed(2)).toBe('310.25');
    expect(candidate.source).toBe('HNB');
  });

  it('reports a missing USD entry with the currencies it saw', () => {
    const response: HnbResponse = { ex: [{ currencyCode: 'EUR' }, { currency: 'Japanese Yen' }] };

    const error = transformHnbResponse(response, today)._unsafeUnwrapErr();

    expect(error.kind).toBe('not-found');
    expect(error.details?.received).toBe('EUR, Japanese Yen');
  });

  it('rejects a zero selling rate', () => {
    const response: HnbResponse = { ex: [{ buyingRate: 302.75, currencyCode: 'USD', sellingRate: 0 }] };

    const error = transformHnbResponse(response, today)._unsafeUnwrapErr();

    expect(error.kind).toBe('validation');
    expect(error.message).toBe('Non-positive sell rate: 0');
  });

  it('rejects a missing buying rate', () => {
    const response: HnbResponse = { ex: [{ currencyCode: 'USD', sellingRate: 310 }] };

    expect(transformHnbResponse(response, today)._unsafeUnwrapErr().message).toBe('Missing buy rate');
  });
});

describe('HnbResponseSchema', () => {
  it('defaults a missing ex array to empty', () => {
    expect(HnbResponseSchema.parse({}).ex).toEqual([]);
  });
});
