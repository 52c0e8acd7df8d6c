import { parseDecimal, wrapError } from '@lkr-rates/core';
import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

import type { RateSource } from '../../core/types.js';
import type { ExchangeRatesDB, RefreshStatus } from '../database.js';

export interface RefreshLogEntry {
  id: number;
  source: RateSource;
  status: RefreshStatus;
  buyRate?: Decimal | undefined;
  sellRate?: Decimal | undefined;
  errorMessage?: string | undefined;
  durationMs: number;
  createdAt: Date;
}

export type NewRefreshLogEntry = Omit<RefreshLogEntry, 'id' | 'createdAt'>;

/**
 * Audit trail of refresh attempts, one row per source per run
 */
export class RefreshLogRepository {
  constructor(
    private readonly db: ExchangeRatesDB,
    private readonly now: () => Date = () => new Date()
  ) {}

  async record(entry: NewRefreshLogEntry): Promise<Result<number, Error>> {
    try {
      const row = await this.db
        .insertInto('exchange_rate_refresh_logs')
        .values({
          buy_rate: entry.buyRate ? entry.buyRate.toFixed() : null,
          created_at: this.now().toISOString(),
          duration_ms: entry.durationMs,
          error_message: entry.errorMessage ?? null,
          sell_rate: entry.sellRate ? entry.sellRate.toFixed() : null,
          source: entry.source,
          status: entry.status,
        })
        .returning('id')
        .executeTakeFirstOrThrow();

      return ok(row.id);
    } catch (error) {
      return wrapError(error, `Failed to record refresh log for ${entry.source}`);
    }
  }

  /**
   * Most recent entries first
   */
  async list(limit = 50): Promise<Result<RefreshLogEntry[], Error>> {
    try {
      const rows = await this.db
        .selectFrom('exchange_rate_refresh_logs')
        .selectAll()
        .orderBy('created_at', 'desc')
        .orderBy('id', 'desc')
        .limit(limit)
        .execute();

      return ok(
        rows.map((row) => ({
          buyRate: row.buy_rate === null ? undefined : parseDecimal(row.buy_rate),
          createdAt: new Date(row.created_at),
          durationMs: row.duration_ms,
          errorMessage: row.error_message ?? undefined,
          id: row.id,
          sellRate: row.sell_rate === null ? undefined : parseDecimal(row.sell_rate),
          source: row.source,
          status: row.status,
        }))
      );
    } catch (error) {
      return wrapError(error, 'Failed to list refresh logs');
    }
  }
}
