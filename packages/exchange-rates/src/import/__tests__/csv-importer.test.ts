import { describe, expect, it } from 'vitest';

import { day } from '../../__tests__/test-helpers.js';
import { locateColumns, parseExchangeRateCsv } from '../csv-importer.js';

describe('locateColumns', () => {
  it('matches headers by substring regardless of case', () => {
    expect(locateColumns(['Date', 'Buy Rate (LKR)', 'Sell Rate (LKR)'])._unsafeUnwrap()).toEqual({
      buy: 1,
      date: 0,
      sell: 2,
    });
    expect(locateColumns(['SELLING RATE', 'value date', 'buying rate'])._unsafeUnwrap()).toEqual({
      buy: 2,
      date: 1,
      sell: 0,
    });
  });

  it('names every missing column', () => {
    const result = locateColumns(['Date', 'Buy', 'Sell']);

    expect(result._unsafeUnwrapErr().message).toBe('CSV is missing required columns: buy rate, sell rate');
  });
});

describe('parseExchangeRateCsv', () => {
  it('keeps the last row for a duplicated date', () => {
    const csv = 'Date,Buy Rate (LKR),Sell Rate (LKR)\n2025-11-21,304.2758,311.8332\n2025-11-21,999,999\n';

    const result = parseExchangeRateCsv(csv)._unsafeUnwrap();

    expect(result.rates.size).toBe(1);
    const rate = result.rates.get(day('2025-11-21'));
    expect(rate?.buyRate.toFixed(4)).toBe('999.0000');
    expect(rate?.sellRate.toFixed(4)).toBe('999.0000');
    expect(rate?.source).toBe('CSV');
    expect(result.totalRows).toBe(2);
    expect(result.skipped).toEqual([]);
  });

  it('skips rows with bad dates or rates and reports them', () => {
    const csv = [
      'Date,Buy Rate,Sell Rate',
      '2025-11-19,300.1000,307.5000',
      '21/11/2025,301,308',
      '2025-11-20,,308',
      '2025-11-22,0,308',
      '2025-02-30,301,308',
    ].join('\n');

    const result = parseExchangeRateCsv(csv)._unsafeUnwrap();

    expect([...result.rates.keys()]).toEqual(['2025-11-19']);
    expect(result.totalRows).toBe(5);
    expect(result.skipped).toEqual([
      { reason: 'Invalid date "21/11/2025". Use YYYY-MM-DD', row: 2 },
      { reason: 'Missing buy rate', row: 3 },
      { reason: 'Non-positive buy rate: 0', row: 4 },
      { reason: 'Invalid date "2025-02-30". Use YYYY-MM-DD', row: 5 },
    ]);
  });

  it('strips a byte order mark, whitespace and thousands separators', () => {
    const csv = '\uFEFFdate , buy rate , sell rate\n 2025-11-21 ,"1,304.50","1,311.75"\n';

    const result = parseExchangeRateCsv(csv)._unsafeUnwrap();

    expect(result.rates.get(day('2025-11-21'))?.buyRate.toFixed(2)).toBe('1304.50');
    expect(result.rates.get(day('2025-11-21'))?.sellRate.toFixed(2)).toBe('1311.75');
  });

  it('fails the whole input when a required column is missing', () => {
    const result = parseExchangeRateCsv('Date,Rate\n2025-11-21,304\n');

    expect(result._unsafeUnwrapErr().message).toBe('CSV is missing required columns: buy rate, sell rate');
  });

  it('fails on empty input', () => {
    expect(parseExchangeRateCsv('')._unsafeUnwrapErr().message).toBe('CSV is empty');
  });
});
