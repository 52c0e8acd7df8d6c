import { HttpClient } from '@lkr-rates/http';
import { describe, expect, it, vi } from 'vitest';

import {
  createCbslPage,
  createFixedClock,
  createMockHttpEffects,
  day,
  textResponse,
} from '../../../__tests__/test-helpers.js';
import { supportsBulkRange, supportsHistoricalLookup } from '../../../core/types.js';
import { CBSL_URL, createCbslProvider } from '../provider.js';

function setup(fetchImpl: ReturnType<typeof vi.fn>, lookbackDays?: number) {
  return createCbslProvider({
    clock: createFixedClock('2025-11-22'),
    httpEffects: createMockHttpEffects(fetchImpl),
    lookbackDays,
  })._unsafeUnwrap();
}

const WEEK_PAGE = createCbslPage([
  ['2025-11-17', '303.1000', '310.6000'],
  ['2025-11-18', '303.5000', '311.0000'],
  ['2025-11-19', '303.7000', '311.2000'],
  ['2025-11-20', '303.9012', '311.4460'],
  ['2025-11-21', '304.2758', '311.8332'],
]);

describe('CbslProvider', () => {
  it('declares historical and bulk support with CBSL trusted sources', () => {
    const provider = setup(vi.fn());
    const metadata = provider.getMetadata();

    expect(metadata.name).toBe('cbsl');
    expect(supportsHistoricalLookup(provider)).toBe(true);
    expect(supportsBulkRange(provider)).toBe(true);
    expect(metadata.trustedSources).toEqual(['CBSL', 'CBSL_BULK', 'CSV']);
  });

  describe('fetchForDate', () => {
    it('posts the lookup form for the lookback window and returns the exact row', async () => {
      const mockFetch = vi.fn().mockResolvedValue(textResponse(WEEK_PAGE));
      const provider = setup(mockFetch);

      const result = await provider.fetchForDate(day('2025-11-21'));

      const candidate = result._unsafeUnwrap();
      expect(candidate.date).toBe('2025-11-21');
      expect(candidate.buyRate.toFixed(4)).toBe('304.2758');
      expect(candidate.sellRate.toFixed(4)).toBe('311.8332');
      expect(candidate.source).toBe('CBSL');
      expect(candidate.note).toBeUndefined();
      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(mockFetch).toHaveBeenCalledWith(
        CBSL_URL,
        expect.objectContaining({
          body: expect.stringContaining('txtEnd=2025-11-21&txtStart=2025-11-14'),
          method: 'POST',
        })
      );
    });

    it('honours a custom lookback window', async () => {
      const mockFetch = vi.fn().mockResolvedValue(textResponse(WEEK_PAGE));
      const provider = setup(mockFetch, 3);

      await provider.fetchForDate(day('2025-11-21'));

      expect(mockFetch).toHaveBeenCalledWith(
        CBSL_URL,
        expect.objectContaining({ body: expect.stringContaining('txtStart=2025-11-18') })
      );
    });

    it('substitutes the latest earlier row and notes the date', async () => {
      const provider = setup(vi.fn().mockResolvedValue(textResponse(WEEK_PAGE)));

      const candidate = (await provider.fetchForDate(day('2025-11-22')))._unsafeUnwrap();

      expect(candidate.date).toBe('2025-11-21');
      expect(candidate.note).toBe('Rate from 2025-11-21 (nearest available date)');
    });

    it('returns not-found when the window has no rows', async () => {
      const provider = setup(vi.fn().mockResolvedValue(textResponse(createCbslPage([]))));

      const error = (await provider.fetchForDate(day('2025-11-21')))._unsafeUnwrapErr();

      expect(error.kind).toBe('not-found');
      expect(error.message).toBe('No CBSL rate on or before 2025-11-21');
    });

    it('maps non-2xx responses to http errors', async () => {
      const provider = setup(vi.fn().mockResolvedValue(textResponse('Service Unavailable', 503)));

      const error = (await provider.fetchForDate(day('2025-11-21')))._unsafeUnwrapErr();

      expect(error.kind).toBe('http');
      expect(error.message).toBe('Central Bank of Sri Lanka fetchForDate failed: HTTP 503: Service Unavailable');
    });

    it('maps timeouts to transport errors', async () => {
      const abortError = new Error('This operation was aborted');
      abortError.name = 'AbortError';
      const provider = setup(vi.fn().mockRejectedValue(abortError));

      const error = (await provider.fetchForDate(day('2025-11-21')))._unsafeUnwrapErr();

      expect(error.kind).toBe('transport');
      expect(error.message).toBe('Central Bank of Sri Lanka fetchForDate failed: Request timeout after 15000ms');
    });

    it('rejects rows with non-positive rates', async () => {
      const page = createCbslPage([['2025-11-21', '0.0000', '311.8332']]);
      const provider = setup(vi.fn().mockResolvedValue(textResponse(page)));

      const error = (await provider.fetchForDate(day('2025-11-21')))._unsafeUnwrapErr();

      expect(error.kind).toBe('validation');
      expect(error.message).toBe('Non-positive buy rate: 0');
    });
  });

  describe('fetchCurrent', () => {
    it('looks up the clock date', async () => {
      const mockFetch = vi.fn().mockResolvedValue(textResponse(WEEK_PAGE));
      const provider = setup(mockFetch);

      const candidate = (await provider.fetchCurrent())._unsafeUnwrap();

      expect(candidate.date).toBe('2025-11-21');
      expect(candidate.note).toBe('Rate from 2025-11-21 (nearest available date)');
      expect(mockFetch).toHaveBeenCalledWith(
        CBSL_URL,
        expect.objectContaining({ body: expect.stringContaining('txtEnd=2025-11-22') })
      );
    });
  });

  describe('fetchBulkRange', () => {
    it('returns every valid row tagged CBSL_BULK and skips the rest', async () => {
      const page = createCbslPage([
        ['2025-11-19', '303.7000', '311.2000'],
        ['2025-11-20', '-', '311.4460'],
        ['holiday', '', ''],
        ['2025-11-21', '304.2758', '311.8332'],
      ]);
      const mockFetch = vi.fn().mockResolvedValue(textResponse(page));
      const provider = setup(mockFetch);

      const candidates = (await provider.fetchBulkRange(day('2023-11-22'), day('2025-11-22')))._unsafeUnwrap();

      expect(candidates.map((candidate) => [candidate.date, candidate.source])).toEqual([
        ['2025-11-19', 'CBSL_BULK'],
        ['2025-11-21', 'CBSL_BULK'],
      ]);
      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(mockFetch).toHaveBeenCalledWith(
        CBSL_URL,
        expect.objectContaining({ body: expect.stringContaining('txtEnd=2025-11-22&txtStart=2023-11-22') })
      );
    });

    it('fails with not-found when no row is usable', async () => {
      const provider = setup(vi.fn().mockResolvedValue(textResponse(createCbslPage([]))));

      const error = (await provider.fetchBulkRange(day('2025-11-01'), day('2025-11-22')))._unsafeUnwrapErr();

      expect(error.kind).toBe('not-found');
      expect(error.message).toBe('No rates in CBSL response for 2025-11-01 to 2025-11-22');
    });

    it('reports a missing table as a parse error', async () => {
      const provider = setup(vi.fn().mockResolvedValue(textResponse('<html>maintenance</html>')));

      const error = (await provider.fetchBulkRange(day('2025-11-01'), day('2025-11-22')))._unsafeUnwrapErr();

      expect(error.kind).toBe('parse');
    });

    it('turns a thrown error into a transport failure', async () => {
      const provider = setup(vi.fn());
      const postForm = vi.spyOn(HttpClient.prototype, 'postForm').mockRejectedValueOnce(new Error('socket closed'));

      try {
        const result = await provider.fetchBulkRange(day('2025-11-01'), day('2025-11-22'));

        const error = result._unsafeUnwrapErr();
        expect(error.kind).toBe('transport');
        expect(error.message).toBe('Central Bank of Sri Lanka fetchBulkRange failed: socket closed');
      } finally {
        postForm.mockRestore();
      }
    });
  });
});
