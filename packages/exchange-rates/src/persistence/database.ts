/**
 * Exchange rates database: schema types, creation and migrations
 */

import type { CalendarDate } from '@lkr-rates/core';
import { createSqliteDatabase, runMigrations, type Generated, type Kysely } from '@lkr-rates/sqlite';
import type { Result } from 'neverthrow';

import type { RateSource } from '../core/types.js';

import { migrations } from './migrations/index.js';

export interface ExchangeRatesTable {
  id: Generated<number>;
  date: CalendarDate;
  /** Decimal string, four or more fraction digits */
  buy_rate: string;
  sell_rate: string;
  source: RateSource;
  /** ISO 8601 timestamps */
  created_at: string;
  updated_at: string;
}

export type RefreshStatus = 'success' | 'failure';

export interface ExchangeRateRefreshLogsTable {
  id: Generated<number>;
  source: RateSource;
  status: RefreshStatus;
  buy_rate: string | null;
  sell_rate: string | null;
  error_message: string | null;
  duration_ms: number;
  created_at: string;
}

export interface ExchangeRatesDatabase {
  exchange_rates: ExchangeRatesTable;
  exchange_rate_refresh_logs: ExchangeRateRefreshLogsTable;
}

export type ExchangeRatesDB = Kysely<ExchangeRatesDatabase>;

export function createExchangeRatesDatabase(dbPath: string): Result<ExchangeRatesDB, Error> {
  return createSqliteDatabase<ExchangeRatesDatabase>(dbPath);
}

export async function initializeExchangeRatesDatabase(db: ExchangeRatesDB): Promise<Result<void, Error>> {
  return runMigrations(db, migrations);
}
