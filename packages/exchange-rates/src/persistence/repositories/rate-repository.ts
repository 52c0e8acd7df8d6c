/**
 * Rate repository - owns persisted exchange rates
 */

import { parseDecimal, wrapError, type CalendarDate } from '@lkr-rates/core';
import { getLogger } from '@lkr-rates/logger';
import type { Selectable } from '@lkr-rates/sqlite';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { validateCandidate } from '../../core/rate-validation.js';
import type { RateCandidate, RateRecord, RateSource } from '../../core/types.js';
import type { ExchangeRatesDB, ExchangeRatesTable } from '../database.js';

type ExchangeRateRow = Selectable<ExchangeRatesTable>;

function rowToRecord(row: ExchangeRateRow): RateRecord {
  return {
    buyRate: parseDecimal(row.buy_rate),
    createdAt: new Date(row.created_at),
    date: row.date,
    sellRate: parseDecimal(row.sell_rate),
    source: row.source,
    updatedAt: new Date(row.updated_at),
  };
}

/**
 * Repository for persisted exchange rates. Reads are always filtered by the
 * caller's trusted sources.
 */
export class RateRepository {
  private readonly logger = getLogger('RateRepository');

  constructor(
    private readonly db: ExchangeRatesDB,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Exact match for a date. When several trusted sources have a row, the most
   * recently updated one wins.
   */
  async get(date: CalendarDate, allowedSources: readonly RateSource[]): Promise<Result<RateRecord | undefined, Error>> {
    if (allowedSources.length === 0) {
      return ok(undefined);
    }

    try {
      const row = await this.db
        .selectFrom('exchange_rates')
        .selectAll()
        .where('date', '=', date)
        .where('source', 'in', allowedSources)
        .orderBy('updated_at', 'desc')
        .orderBy('id', 'desc')
        .limit(1)
        .executeTakeFirst();

      return ok(row ? rowToRecord(row) : undefined);
    } catch (error) {
      return wrapError(error, `Failed to get rate for ${date}`);
    }
  }

  /**
   * Latest row dated on or before the given date
   */
  async getNearestBefore(
    date: CalendarDate,
    allowedSources: readonly RateSource[]
  ): Promise<Result<RateRecord | undefined, Error>> {
    if (allowedSources.length === 0) {
      return ok(undefined);
    }

    try {
      const row = await this.db
        .selectFrom('exchange_rates')
        .selectAll()
        .where('date', '<=', date)
        .where('source', 'in', allowedSources)
        .orderBy('date', 'desc')
        .orderBy('updated_at', 'desc')
        .orderBy('id', 'desc')
        .limit(1)
        .executeTakeFirst();

      return ok(row ? rowToRecord(row) : undefined);
    } catch (error) {
      return wrapError(error, `Failed to get nearest rate before ${date}`);
    }
  }

  /**
   * Insert or overwrite the (date, source) row. Rates that are not positive
   * are rejected before storage is touched.
   */
  async upsert(candidate: RateCandidate): Promise<Result<RateRecord, Error>> {
    const validated = validateCandidate(candidate, 'repository');
    if (validated.isErr()) {
      return err(validated.error);
    }

    try {
      const timestamp = this.now().toISOString();
      const row = await this.db
        .insertInto('exchange_rates')
        .values(this.toInsertValues(candidate, timestamp))
        .onConflict((oc) =>
          oc.columns(['date', 'source']).doUpdateSet({
            buy_rate: candidate.buyRate.toFixed(),
            sell_rate: candidate.sellRate.toFixed(),
            updated_at: timestamp,
          })
        )
        .returningAll()
        .executeTakeFirstOrThrow();

      return ok(rowToRecord(row));
    } catch (error) {
      this.logger.error({ date: candidate.date, error, source: candidate.source }, 'Failed to save exchange rate');
      return wrapError(error, `Failed to save rate for ${candidate.date} (${candidate.source})`);
    }
  }

  /**
   * Upsert many candidates in one transaction. Any invalid candidate rejects
   * the whole batch.
   */
  async upsertMany(candidates: readonly RateCandidate[]): Promise<Result<number, Error>> {
    for (const candidate of candidates) {
      const validated = validateCandidate(candidate, 'repository');
      if (validated.isErr()) {
        return err(validated.error);
      }
    }

    if (candidates.length === 0) {
      return ok(0);
    }

    try {
      const timestamp = this.now().toISOString();
      await this.db.transaction().execute(async (trx) => {
        for (const candidate of candidates) {
          await trx
            .insertInto('exchange_rates')
            .values(this.toInsertValues(candidate, timestamp))
            .onConflict((oc) =>
              oc.columns(['date', 'source']).doUpdateSet({
                buy_rate: candidate.buyRate.toFixed(),
                sell_rate: candidate.sellRate.toFixed(),
                updated_at: timestamp,
              })
            )
            .execute();
        }
      });

      this.logger.debug(`Upserted ${candidates.length} exchange rates`);
      return ok(candidates.length);
    } catch (error) {
      this.logger.error({ count: candidates.length, error }, 'Failed to save exchange rates batch');
      return wrapError(error, `Failed to save ${candidates.length} rates`);
    }
  }

  async isEmpty(allowedSources: readonly RateSource[]): Promise<Result<boolean, Error>> {
    if (allowedSources.length === 0) {
      return ok(true);
    }

    try {
      const row = await this.db
        .selectFrom('exchange_rates')
        .select('id')
        .where('source', 'in', allowedSources)
        .limit(1)
        .executeTakeFirst();

      return ok(row === undefined);
    } catch (error) {
      return wrapError(error, 'Failed to check for stored rates');
    }
  }

  /**
   * Rows in [start, end], date ascending. A date with rows from several
   * trusted sources yields the most recently updated one.
   */
  async findInRange(
    start: CalendarDate,
    end: CalendarDate,
    allowedSources: readonly RateSource[]
  ): Promise<Result<RateRecord[], Error>> {
    if (allowedSources.length === 0) {
      return ok([]);
    }

    try {
      const rows = await this.db
        .selectFrom('exchange_rates')
        .selectAll()
        .where('date', '>=', start)
        .where('date', '<=', end)
        .where('source', 'in', allowedSources)
        .orderBy('date', 'asc')
        .orderBy('updated_at', 'desc')
        .orderBy('id', 'desc')
        .execute();

      const byDate = new Map<CalendarDate, RateRecord>();
      for (const row of rows) {
        if (!byDate.has(row.date)) {
          byDate.set(row.date, rowToRecord(row));
        }
      }
      return ok([...byDate.values()]);
    } catch (error) {
      return wrapError(error, `Failed to list rates from ${start} to ${end}`);
    }
  }

  async getDatesInRange(
    start: CalendarDate,
    end: CalendarDate,
    allowedSources: readonly RateSource[]
  ): Promise<Result<Set<CalendarDate>, Error>> {
    if (allowedSources.length === 0) {
      return ok(new Set());
    }

    try {
      const rows = await this.db
        .selectFrom('exchange_rates')
        .select('date')
        .distinct()
        .where('date', '>=', start)
        .where('date', '<=', end)
        .where('source', 'in', allowedSources)
        .execute();

      return ok(new Set(rows.map((row) => row.date)));
    } catch (error) {
      return wrapError(error, `Failed to list cached dates from ${start} to ${end}`);
    }
  }

  private toInsertValues(candidate: RateCandidate, timestamp: string) {
    return {
      buy_rate: candidate.buyRate.toFixed(),
      created_at: timestamp,
      date: candidate.date,
      sell_rate: candidate.sellRate.toFixed(),
      source: candidate.source,
      updated_at: timestamp,
    };
  }
}
