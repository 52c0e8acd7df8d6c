/**
 * Resolution engine: turns "rate for provider P on date D" into exactly one
 * resolution by walking a fixed fallback chain.
 *
 *   1. stored row for D from a trusted source
 *   2. bulk backfill when nothing trusted is stored (bulk-capable providers)
 *   3. live fetch (historical lookup, or current rate when D is today)
 *   4. nearest stored row before D
 *   5. not-found
 */

import { addDays, type CalendarDate } from '@lkr-rates/core';
import { getLogger } from '@lkr-rates/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { RateRepository } from '../persistence/repositories/rate-repository.js';

import { RateSourceError } from './errors.js';
import { nearestDateNote, validateCandidate } from './rate-validation.js';
import type {
  Clock,
  IRateProvider,
  RateCandidate,
  RateOrigin,
  RateProviderMetadata,
  RateRecord,
  RateResolution,
} from './types.js';
import { supportsBulkRange, supportsHistoricalLookup } from './types.js';

export const DEFAULT_BULK_WINDOW_DAYS = 730;

export interface RateResolverOptions {
  /** Length of the trailing window fetched when backfilling an empty store */
  bulkWindowDays?: number | undefined;
}

type RateSnapshot = Pick<RateRecord, 'date' | 'buyRate' | 'sellRate' | 'source'>;

export class RateResolver {
  private readonly logger = getLogger('RateResolver');
  private readonly metadata: RateProviderMetadata;
  private readonly bulkWindowDays: number;

  constructor(
    private readonly provider: IRateProvider,
    private readonly repository: RateRepository,
    private readonly clock: Clock,
    options: RateResolverOptions = {}
  ) {
    this.metadata = provider.getMetadata();
    this.bulkWindowDays = options.bulkWindowDays ?? DEFAULT_BULK_WINDOW_DAYS;
  }

  /**
   * Repository read failures and future dates are the only errors; an
   * unavailable rate is a `not-found` resolution.
   */
  async resolve(date: CalendarDate): Promise<Result<RateResolution, Error>> {
    const today = this.clock.today();
    if (date > today) {
      return err(new Error(`Cannot resolve a rate for future date ${date} (today is ${today})`));
    }

    const trusted = this.metadata.trustedSources;

    const cached = await this.repository.get(date, trusted);
    if (cached.isErr()) {
      return err(cached.error);
    }
    if (cached.value) {
      this.logger.debug(`Cache hit for ${this.metadata.name} on ${date}`);
      return ok(this.found(date, cached.value, 'cache'));
    }

    const backfilled = await this.backfillIfEmpty(date, today);
    if (backfilled.isErr()) {
      return err(backfilled.error);
    }
    if (backfilled.value) {
      return ok(backfilled.value);
    }

    const live = await this.fetchLive(date, today);
    if (live.isOk()) {
      return ok(live.value);
    }

    const nearest = await this.repository.getNearestBefore(date, trusted);
    if (nearest.isErr()) {
      return err(nearest.error);
    }
    if (nearest.value) {
      this.logger.info(`Using nearest stored ${this.metadata.name} rate from ${nearest.value.date} for ${date}`);
      return ok(this.found(date, nearest.value, 'nearest'));
    }

    this.logger.warn(`No ${this.metadata.name} rate available for ${date}`);
    return ok({ kind: 'not-found', provider: this.metadata.name, requestedDate: date });
  }

  /**
   * Fetch the trailing window once when no trusted row exists, then retry the
   * exact lookup. Bulk failures fall through to the live fetch.
   */
  private async backfillIfEmpty(
    date: CalendarDate,
    today: CalendarDate
  ): Promise<Result<RateResolution | undefined, Error>> {
    if (!supportsBulkRange(this.provider)) {
      return ok(undefined);
    }

    const empty = await this.repository.isEmpty(this.metadata.trustedSources);
    if (empty.isErr()) {
      return err(empty.error);
    }
    if (!empty.value) {
      return ok(undefined);
    }

    const start = addDays(today, -this.bulkWindowDays);
    this.logger.info(`No stored ${this.metadata.name} rates, backfilling ${start} to ${today}`);

    const bulk = await this.provider.fetchBulkRange(start, today);
    if (bulk.isErr()) {
      this.logger.warn({ kind: bulk.error.kind }, `Bulk backfill failed: ${bulk.error.message}`);
      return ok(undefined);
    }

    const valid = bulk.value.filter((candidate) => validateCandidate(candidate, this.metadata.name).isOk());
    const saved = await this.repository.upsertMany(valid);
    if (saved.isErr()) {
      this.logger.error({ error: saved.error }, 'Failed to persist bulk backfill');
      return ok(undefined);
    }

    this.logger.info(`Backfilled ${saved.value} ${this.metadata.name} rates`);

    const cached = await this.repository.get(date, this.metadata.trustedSources);
    if (cached.isErr()) {
      return err(cached.error);
    }
    return ok(cached.value ? this.found(date, cached.value, 'bulk') : undefined);
  }

  private async fetchLive(date: CalendarDate, today: CalendarDate): Promise<Result<RateResolution, RateSourceError>> {
    let fetched: Result<RateCandidate, RateSourceError>;
    if (supportsHistoricalLookup(this.provider)) {
      fetched = await this.provider.fetchForDate(date);
    } else if (date === today) {
      fetched = await this.provider.fetchCurrent();
    } else {
      return err(this.unavailable(date));
    }

    const candidate = fetched.andThen((value) => validateCandidate(value, this.metadata.name));
    if (candidate.isErr()) {
      this.logger.info(`Live ${this.metadata.name} fetch for ${date} failed: ${candidate.error.message}`);
      return err(candidate.error);
    }

    if (candidate.value.date > date) {
      this.logger.warn(`Provider returned ${candidate.value.date} for requested ${date}, discarding`);
      return err(this.unavailable(date));
    }

    const saved = await this.repository.upsert(candidate.value);
    if (saved.isErr()) {
      this.logger.error(
        { date: candidate.value.date, error: saved.error, source: candidate.value.source },
        'Failed to persist fetched rate'
      );
    }

    return ok(this.found(date, candidate.value, 'live'));
  }

  private found(requestedDate: CalendarDate, rate: RateSnapshot, origin: RateOrigin): RateResolution {
    const resolved = {
      buyRate: rate.buyRate,
      date: rate.date,
      origin,
      requestedDate,
      sellRate: rate.sellRate,
      source: rate.source,
    };

    if (rate.date === requestedDate) {
      return { kind: 'exact', provider: this.metadata.name, rate: resolved };
    }

    return {
      kind: 'approximated',
      note: nearestDateNote(rate.date),
      provider: this.metadata.name,
      rate: resolved,
    };
  }

  private unavailable(date: CalendarDate): RateSourceError {
    return new RateSourceError(
      `${this.metadata.displayName} has no live rate for ${date}`,
      'not-found',
      this.metadata.name
    );
  }
}
