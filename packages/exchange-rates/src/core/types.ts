import type { CalendarDate } from '@lkr-rates/core';
import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';

import type { RateSourceError } from './errors.js';

/**
 * Provenance tags written to storage. Resolution policy branches on these,
 * so the set is closed.
 */
export const RATE_SOURCES = ['CBSL', 'CBSL_BULK', 'HNB', 'PB', 'SAMPATH', 'CSV'] as const;

export type RateSource = (typeof RATE_SOURCES)[number];

export function isRateSource(value: string): value is RateSource {
  return RATE_SOURCES.some((source) => source === value);
}

/**
 * Short codes used to pick a provider (CLI arguments, bank labels)
 */
export const PROVIDER_NAMES = ['cbsl', 'hnb', 'pb', 'sampath'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

/**
 * Transient rate produced by a provider or the CSV importer, not yet persisted
 */
export interface RateCandidate {
  /** Date the rate applies to; may be earlier than the requested date */
  date: CalendarDate;
  /** LKR per 1 USD when the bank buys USD */
  buyRate: Decimal;
  /** LKR per 1 USD when the bank sells USD */
  sellRate: Decimal;
  source: RateSource;
  /** Set when the provider substituted an earlier date from its own dataset */
  note?: string | undefined;
}

/**
 * Persisted rate. Unique per (date, source).
 */
export interface RateRecord {
  date: CalendarDate;
  buyRate: Decimal;
  sellRate: Decimal;
  source: RateSource;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Where a resolved rate came from during a single resolve call
 * - cache: exact row already stored
 * - bulk: stored by the cold-store backfill during this call
 * - live: fetched from the provider during this call
 * - nearest: earlier stored row substituted for the requested date
 */
export type RateOrigin = 'cache' | 'bulk' | 'live' | 'nearest';

export interface ResolvedRate {
  requestedDate: CalendarDate;
  date: CalendarDate;
  buyRate: Decimal;
  sellRate: Decimal;
  source: RateSource;
  origin: RateOrigin;
}

/**
 * Outcome of resolving one date. `not-found` is a business outcome, never an error.
 */
export type RateResolution =
  | { kind: 'exact'; provider: ProviderName; rate: ResolvedRate }
  | { kind: 'approximated'; provider: ProviderName; rate: ResolvedRate; note: string }
  | { kind: 'not-found'; provider: ProviderName; requestedDate: CalendarDate };

export type FoundRateResolution = Exclude<RateResolution, { kind: 'not-found' }>;

export interface RateProviderMetadata {
  name: ProviderName;
  displayName: string;
  /** Tag written for rates fetched live */
  source: RateSource;
  /** Tags this provider may read back from storage */
  trustedSources: readonly RateSource[];
}

/**
 * Source adapter contract. Implementations never throw; every failure is a
 * RateSourceError value.
 */
export interface IRateProvider {
  getMetadata(): RateProviderMetadata;

  /** Rate for the provider's current business day */
  fetchCurrent(): Promise<Result<RateCandidate, RateSourceError>>;

  /** Release HTTP resources */
  destroy(): Promise<void>;
}

export interface IHistoricalRateProvider extends IRateProvider {
  fetchForDate(date: CalendarDate): Promise<Result<RateCandidate, RateSourceError>>;
}

export interface IBulkRateProvider extends IRateProvider {
  fetchBulkRange(start: CalendarDate, end: CalendarDate): Promise<Result<RateCandidate[], RateSourceError>>;
}

export function supportsHistoricalLookup(provider: IRateProvider): provider is IHistoricalRateProvider {
  return 'fetchForDate' in provider && typeof provider.fetchForDate === 'function';
}

export function supportsBulkRange(provider: IRateProvider): provider is IBulkRateProvider {
  return 'fetchBulkRange' in provider && typeof provider.fetchBulkRange === 'function';
}

/**
 * Source of "now" and "today"; injected so resolution is deterministic in tests
 */
export interface Clock {
  now(): Date;
  today(): CalendarDate;
}
