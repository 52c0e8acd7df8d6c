/**
 * Exchange rate service
 *
 * Facade over the resolvers, repositories and providers. Every entry point
 * used by the CLI goes through here.
 */

import { addDays, daysInMonth, eachDayInRange, type CalendarDate } from '@lkr-rates/core';
import { getLogger } from '@lkr-rates/logger';
import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { parseExchangeRateCsv, type CsvRowIssue } from '../import/csv-importer.js';
import type { RateRepository } from '../persistence/repositories/rate-repository.js';
import type { RefreshLogEntry, RefreshLogRepository } from '../persistence/repositories/refresh-log-repository.js';

import { RateResolver } from './rate-resolver.js';
import type {
  Clock,
  FoundRateResolution,
  IRateProvider,
  ProviderName,
  RateRecord,
  RateResolution,
  RateSource,
} from './types.js';

export interface ExchangeRateServiceDeps {
  clock: Clock;
  providers: ReadonlyMap<ProviderName, IRateProvider>;
  rates: RateRepository;
  refreshLogs: RefreshLogRepository;
  bulkWindowDays?: number | undefined;
  /** Extra cleanup run by destroy(), after providers are released */
  onDestroy?: (() => Promise<void>) | undefined;
}

export interface MonthRates {
  year: number;
  month: number;
  rates: Map<CalendarDate, FoundRateResolution>;
  /** Past or current dates with no rate and no substitute */
  missing: CalendarDate[];
  /** Dates after today, never resolved */
  skippedFuture: CalendarDate[];
}

export type RefreshOutcome =
  | {
      provider: ProviderName;
      source: RateSource;
      status: 'success';
      date: CalendarDate;
      buyRate: Decimal;
      sellRate: Decimal;
      durationMs: number;
    }
  | { provider: ProviderName; source: RateSource; status: 'failure'; error: string; durationMs: number };

export interface CacheRangeSummary {
  start: CalendarDate;
  end: CalendarDate;
  totalDates: number;
  alreadyCached: number;
  newlyCached: number;
  /** Resolved only by substituting an earlier date */
  approximated: number;
  failed: number;
}

export interface CsvImportSummary {
  imported: number;
  skipped: CsvRowIssue[];
  totalParsed: number;
}

export class ExchangeRateService {
  private readonly logger = getLogger('ExchangeRateService');
  private readonly resolvers = new Map<ProviderName, RateResolver>();
  private destroyed = false;

  constructor(private readonly deps: ExchangeRateServiceDeps) {
    for (const [name, provider] of deps.providers) {
      this.resolvers.set(
        name,
        new RateResolver(provider, deps.rates, deps.clock, { bulkWindowDays: deps.bulkWindowDays })
      );
    }
  }

  /**
   * Today in the service's time zone
   */
  today(): CalendarDate {
    return this.deps.clock.today();
  }

  getProviderNames(): ProviderName[] {
    return [...this.deps.providers.keys()];
  }

  async resolve(provider: ProviderName, date: CalendarDate): Promise<Result<RateResolution, Error>> {
    const resolver = this.resolvers.get(provider);
    if (!resolver) {
      return err(new Error(`Provider ${provider} is not registered`));
    }
    return resolver.resolve(date);
  }

  /**
   * Resolve every day of a month in order. Days after today are skipped.
   */
  async resolveMonth(provider: ProviderName, year: number, month: number): Promise<Result<MonthRates, Error>> {
    if (!Number.isInteger(month) || month < 1 || month > 12) {
      return err(new Error(`Invalid month ${month}. Use 1-12`));
    }
    if (!Number.isInteger(year) || year < 1000 || year > 9999) {
      return err(new Error(`Invalid year ${year}`));
    }

    const today = this.deps.clock.today();
    const result: MonthRates = { missing: [], month, rates: new Map(), skippedFuture: [], year };

    for (const date of daysInMonth(year, month)) {
      if (date > today) {
        result.skippedFuture.push(date);
        continue;
      }

      const resolution = await this.resolve(provider, date);
      if (resolution.isErr()) {
        return err(resolution.error);
      }
      if (resolution.value.kind === 'not-found') {
        result.missing.push(date);
      } else {
        result.rates.set(date, resolution.value);
      }
    }

    return ok(result);
  }

  /**
   * Resolve one date against every provider. Providers that fail or have no
   * rate are logged and left out.
   */
  async resolveAllBanks(date: CalendarDate): Promise<Result<FoundRateResolution[], Error>> {
    const today = this.deps.clock.today();
    if (date > today) {
      return err(new Error(`Cannot resolve a rate for future date ${date} (today is ${today})`));
    }

    const found: FoundRateResolution[] = [];
    for (const name of this.resolvers.keys()) {
      const resolution = await this.resolve(name, date);
      if (resolution.isErr()) {
        this.logger.warn({ error: resolution.error, provider: name }, `Failed to resolve ${name} rate for ${date}`);
        continue;
      }
      if (resolution.value.kind === 'not-found') {
        this.logger.info(`No ${name} rate for ${date}`);
        continue;
      }
      found.push(resolution.value);
    }

    return ok(found);
  }

  /**
   * Fetch today's rate from every provider, store it, and log one refresh
   * entry per provider.
   */
  async refreshAll(): Promise<Result<RefreshOutcome[], Error>> {
    const outcomes: RefreshOutcome[] = [];

    for (const [name, provider] of this.deps.providers) {
      const { source } = provider.getMetadata();
      const startedAt = this.deps.clock.now().getTime();
      const fetched = await provider.fetchCurrent();

      let outcome: RefreshOutcome;
      if (fetched.isOk()) {
        const saved = await this.deps.rates.upsert(fetched.value);
        const durationMs = this.deps.clock.now().getTime() - startedAt;
        outcome = saved.isOk()
          ? {
              buyRate: fetched.value.buyRate,
              date: fetched.value.date,
              durationMs,
              provider: name,
              sellRate: fetched.value.sellRate,
              source,
              status: 'success',
            }
          : { durationMs, error: saved.error.message, provider: name, source, status: 'failure' };
      } else {
        outcome = {
          durationMs: this.deps.clock.now().getTime() - startedAt,
          error: fetched.error.message,
          provider: name,
          source,
          status: 'failure',
        };
      }

      const logged = await this.deps.refreshLogs.record(
        outcome.status === 'success'
          ? {
              buyRate: outcome.buyRate,
              durationMs: outcome.durationMs,
              sellRate: outcome.sellRate,
              source,
              status: 'success',
            }
          : { durationMs: outcome.durationMs, errorMessage: outcome.error, source, status: 'failure' }
      );
      if (logged.isErr()) {
        this.logger.error({ error: logged.error, provider: name, source }, 'Failed to write refresh log');
      }

      this.logger.audit(
        { durationMs: outcome.durationMs, provider: name, source, status: outcome.status },
        `Refreshed ${name} rate`
      );
      outcomes.push(outcome);
    }

    return ok(outcomes);
  }

  async listRefreshLogs(limit?: number): Promise<Result<RefreshLogEntry[], Error>> {
    return this.deps.refreshLogs.list(limit);
  }

  /**
   * Populate the store for a date range using one provider (CBSL by default).
   * The end date is clamped to today.
   */
  async cacheRange(
    start: CalendarDate,
    end: CalendarDate,
    provider: ProviderName = 'cbsl'
  ): Promise<Result<CacheRangeSummary, Error>> {
    const registered = this.deps.providers.get(provider);
    if (!registered) {
      return err(new Error(`Provider ${provider} is not registered`));
    }

    const today = this.deps.clock.today();
    if (start > end) {
      return err(new Error(`Start date ${start} is after end date ${end}`));
    }
    if (start > today) {
      return err(new Error(`Start date ${start} is in the future`));
    }

    const clampedEnd = end > today ? today : end;
    const dates = eachDayInRange(start, clampedEnd);

    const cachedDates = await this.deps.rates.getDatesInRange(
      start,
      clampedEnd,
      registered.getMetadata().trustedSources
    );
    if (cachedDates.isErr()) {
      return err(cachedDates.error);
    }

    const summary: CacheRangeSummary = {
      alreadyCached: cachedDates.value.size,
      approximated: 0,
      end: clampedEnd,
      failed: 0,
      newlyCached: 0,
      start,
      totalDates: dates.length,
    };

    for (const date of dates) {
      if (cachedDates.value.has(date)) {
        continue;
      }

      const resolution = await this.resolve(provider, date);
      if (resolution.isErr()) {
        return err(resolution.error);
      }

      switch (resolution.value.kind) {
        case 'exact':
          summary.newlyCached++;
          break;
        case 'approximated':
          summary.approximated++;
          break;
        case 'not-found':
          summary.failed++;
          break;
      }
    }

    this.logger.info({ provider, ...summary }, 'Cache range complete');
    return ok(summary);
  }

  async importCsv(content: string): Promise<Result<CsvImportSummary, Error>> {
    const parsed = parseExchangeRateCsv(content);
    if (parsed.isErr()) {
      return err(parsed.error);
    }

    const saved = await this.deps.rates.upsertMany([...parsed.value.rates.values()]);
    if (saved.isErr()) {
      return err(saved.error);
    }

    this.logger.audit(
      { imported: saved.value, skipped: parsed.value.skipped.length },
      `Imported ${saved.value} rates from CSV`
    );
    return ok({ imported: saved.value, skipped: parsed.value.skipped, totalParsed: parsed.value.totalRows });
  }

  /**
   * Stored rates for a provider's trusted sources, date ascending
   */
  async listRates(
    provider: ProviderName,
    start: CalendarDate,
    end: CalendarDate
  ): Promise<Result<RateRecord[], Error>> {
    const registered = this.deps.providers.get(provider);
    if (!registered) {
      return err(new Error(`Provider ${provider} is not registered`));
    }
    if (start > end) {
      return err(new Error(`Start date ${start} is after end date ${end}`));
    }
    return this.deps.rates.findInRange(start, end, registered.getMetadata().trustedSources);
  }

  /**
   * Stored rates for the trailing `days` days ending today
   */
  async listRecentRates(provider: ProviderName, days: number): Promise<Result<RateRecord[], Error>> {
    const today = this.deps.clock.today();
    return this.listRates(provider, addDays(today, -(days - 1)), today);
  }

  async destroy(): Promise<void> {
    if (this.destroyed) return;
    this.destroyed = true;

    for (const provider of this.deps.providers.values()) {
      await provider.destroy();
    }
    await this.deps.onDestroy?.();
  }
}
