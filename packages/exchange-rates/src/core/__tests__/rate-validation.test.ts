import { parseDecimal } from '@lkr-rates/core';
import { describe, expect, it } from 'vitest';

import { createTestCandidate, day } from '../../__tests__/test-helpers.js';
import { buildCandidate, nearestDateNote, validateCandidate } from '../rate-validation.js';

describe('nearestDateNote', () => {
  it('names the substitute date', () => {
    expect(nearestDateNote(day('2025-11-18'))).toBe('Rate from 2025-11-18 (nearest available date)');
  });
});

describe('validateCandidate', () => {
  it('accepts positive rates', () => {
    const candidate = createTestCandidate({
      buyRate: 304.2758,
      date: '2025-11-21',
      sellRate: 311.8332,
      source: 'CBSL',
    });

    expect(validateCandidate(candidate, 'cbsl')._unsafeUnwrap()).toBe(candidate);
  });

  it('rejects a zero or negative rate as a validation error', () => {
    const candidate = createTestCandidate({ buyRate: 304, date: '2025-11-21', sellRate: -2, source: 'HNB' });

    const error = validateCandidate(candidate, 'hnb')._unsafeUnwrapErr();

    expect(error.kind).toBe('validation');
    expect(error.provider).toBe('hnb');
    expect(error.message).toBe('Invalid rates for 2025-11-21: buy=304, sell=-2');
  });

  it('rejects non-finite rates', () => {
    const candidate = {
      ...createTestCandidate({ buyRate: 304, date: '2025-11-21', sellRate: 310, source: 'PB' }),
      buyRate: parseDecimal('Infinity'),
    };

    expect(validateCandidate(candidate, 'pb').isErr()).toBe(true);
  });
});

describe('buildCandidate', () => {
  it('parses numbers and numeric strings', () => {
    const candidate = buildCandidate(
      { buyRate: 303.5, date: day('2025-11-21'), sellRate: '1,311.25', source: 'SAMPATH' },
      'sampath'
    )._unsafeUnwrap();

    expect(candidate.buyRate.toFixed(2)).toBe('303.50');
    expect(candidate.sellRate.toFixed(2)).toBe('1311.25');
    expect(candidate).not.toHaveProperty('note');
  });

  it('keeps a note when given', () => {
    const candidate = buildCandidate(
      {
        buyRate: '303',
        date: day('2025-11-21'),
        note: 'Rate from 2025-11-21 (nearest available date)',
        sellRate: '310',
        source: 'CBSL',
      },
      'cbsl'
    )._unsafeUnwrap();

    expect(candidate.note).toBe('Rate from 2025-11-21 (nearest available date)');
  });

  it('reports which rate is unusable', () => {
    const error = buildCandidate(
      { buyRate: '303', date: day('2025-11-21'), sellRate: 'N/A', source: 'PB' },
      'pb'
    )._unsafeUnwrapErr();

    expect(error.kind).toBe('validation');
    expect(error.message).toBe('Invalid sell rate: N/A');
  });
});
