/**
 * Central Bank of Sri Lanka rate provider
 *
 * Submits the public daily-rates lookup form and scrapes the result table.
 * Supports single-date lookups with a short lookback window and a bulk range
 * fetch used to backfill an empty store.
 */

import { addDays, type CalendarDate } from '@lkr-rates/core';
import type { HttpClient } from '@lkr-rates/http';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { BaseRateProvider } from '../../core/base-rate-provider.js';
import { RateSourceError } from '../../core/errors.js';
import { BROWSER_HEADERS, createProviderHttpClient, type ProviderOptions } from '../../core/provider-utils.js';
import { buildCandidate, nearestDateNote } from '../../core/rate-validation.js';
import type {
  Clock,
  IBulkRateProvider,
  IHistoricalRateProvider,
  RateCandidate,
  RateProviderMetadata,
} from '../../core/types.js';

import { buildCbslFormFields, parseCbslTable, selectRowForDate } from './cbsl-utils.js';

export const CBSL_URL = 'https://www.cbsl.gov.lk/cbsl_custom/exratestt/exrates_resultstt.php';

const SINGLE_DATE_TIMEOUT_MS = 15_000;
const BULK_TIMEOUT_MS = 60_000;
const DEFAULT_LOOKBACK_DAYS = 7;

export interface CbslProviderOptions extends ProviderOptions {
  /** Days before the requested date included in a single-date lookup */
  lookbackDays?: number | undefined;
}

export function createCbslProvider(options: CbslProviderOptions): Result<CbslProvider, Error> {
  const lookbackDays = options.lookbackDays ?? DEFAULT_LOOKBACK_DAYS;
  if (!Number.isInteger(lookbackDays) || lookbackDays < 0) {
    return err(new Error(`CBSL lookback must be a non-negative whole number of days, got ${lookbackDays}`));
  }

  try {
    const httpClient = createProviderHttpClient({
      baseUrl: CBSL_URL,
      defaultHeaders: {
        ...BROWSER_HEADERS,
        Origin: 'https://www.cbsl.gov.lk',
        Referer: CBSL_URL,
      },
      effects: options.httpEffects,
      providerName: 'CBSL',
      timeout: SINGLE_DATE_TIMEOUT_MS,
    });

    return ok(new CbslProvider(httpClient, options.clock, lookbackDays));
  } catch (error) {
    return err(new Error(`Failed to create CBSL provider: ${error instanceof Error ? error.message : String(error)}`));
  }
}

export class CbslProvider extends BaseRateProvider implements IHistoricalRateProvider, IBulkRateProvider {
  protected override readonly metadata: RateProviderMetadata = {
    displayName: 'Central Bank of Sri Lanka',
    name: 'cbsl',
    source: 'CBSL',
    trustedSources: ['CBSL', 'CBSL_BULK', 'CSV'],
  };

  constructor(
    httpClient: HttpClient,
    private readonly clock: Clock,
    private readonly lookbackDays: number
  ) {
    super(httpClient, 'CbslProvider');
  }

  async fetchForDate(date: CalendarDate): Promise<Result<RateCandidate, RateSourceError>> {
    return this.runGuarded('fetchForDate', () => this.fetchForDateInternal(date));
  }

  /**
   * One request over the whole window. Rows that fail validation are skipped.
   */
  async fetchBulkRange(start: CalendarDate, end: CalendarDate): Promise<Result<RateCandidate[], RateSourceError>> {
    try {
      return await this.fetchBulkRangeInternal(start, end);
    } catch (error) {
      const failure = this.toSourceError(error, 'fetchBulkRange');
      this.logFailure('fetchBulkRange', failure);
      return err(failure);
    }
  }

  protected override async fetchCurrentInternal(): Promise<Result<RateCandidate, RateSourceError>> {
    return this.fetchForDateInternal(this.clock.today());
  }

  private async fetchBulkRangeInternal(
    start: CalendarDate,
    end: CalendarDate
  ): Promise<Result<RateCandidate[], RateSourceError>> {
    this.logger.info(`Fetching CBSL bulk range ${start} to ${end}`);

    const html = await this.httpClient.postForm('', buildCbslFormFields(start, end), { timeout: BULK_TIMEOUT_MS });
    if (html.isErr()) {
      const failure = this.toSourceError(html.error, 'fetchBulkRange');
      this.logFailure('fetchBulkRange', failure);
      return err(failure);
    }

    const table = parseCbslTable(html.value);
    if (table.isErr()) {
      this.logFailure('fetchBulkRange', table.error);
      return err(table.error);
    }

    const candidates: RateCandidate[] = [];
    let skipped = table.value.invalidRows;

    for (const row of table.value.rows) {
      const candidate = buildCandidate(
        { buyRate: row.buyRate, date: row.date, sellRate: row.sellRate, source: 'CBSL_BULK' },
        this.metadata.name
      );
      if (candidate.isErr()) {
        skipped++;
        continue;
      }
      candidates.push(candidate.value);
    }

    if (skipped > 0) {
      this.logger.warn(`Skipped ${skipped} invalid rows in CBSL bulk response`);
    }

    if (candidates.length === 0) {
      const failure = new RateSourceError(`No rates in CBSL response for ${start} to ${end}`, 'not-found', 'cbsl');
      this.logFailure('fetchBulkRange', failure);
      return err(failure);
    }

    this.logger.info(`Fetched ${candidates.length} CBSL rates for ${start} to ${end}`);
    return ok(candidates);
  }

  private async fetchForDateInternal(date: CalendarDate): Promise<Result<RateCandidate, RateSourceError>> {
    const start = addDays(date, -this.lookbackDays);
    const html = await this.httpClient.postForm('', buildCbslFormFields(start, date), {
      timeout: SINGLE_DATE_TIMEOUT_MS,
    });
    if (html.isErr()) {
      return err(this.toSourceError(html.error, 'fetchForDate'));
    }

    const table = parseCbslTable(html.value);
    if (table.isErr()) {
      return err(table.error);
    }

    const row = selectRowForDate(table.value.rows, date);
    if (!row) {
      return err(new RateSourceError(`No CBSL rate on or before ${date}`, 'not-found', 'cbsl'));
    }

    if (row.date !== date) {
      this.logger.info(`Exact date ${date} not in CBSL table, using nearest ${row.date}`);
    }

    return buildCandidate(
      {
        buyRate: row.buyRate,
        date: row.date,
        note: row.date === date ? undefined : nearestDateNote(row.date),
        sellRate: row.sellRate,
        source: 'CBSL',
      },
      this.metadata.name
    );
  }
}
