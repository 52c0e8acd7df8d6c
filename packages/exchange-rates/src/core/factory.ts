/**
 * Factory for the exchange rate service
 *
 * Providers are registered in PROVIDER_FACTORIES; the service receives them
 * already built, together with the repositories and the clock.
 */

import { getBulkWindowDays, getCbslLookbackDays, getDatabasePath, getTimeZone } from '@lkr-rates/env';
import { getLogger } from '@lkr-rates/logger';
import { closeSqliteDatabase } from '@lkr-rates/sqlite';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import {
  createExchangeRatesDatabase,
  initializeExchangeRatesDatabase,
  type ExchangeRatesDB,
} from '../persistence/database.js';
import { RateRepository } from '../persistence/repositories/rate-repository.js';
import { RefreshLogRepository } from '../persistence/repositories/refresh-log-repository.js';
import { createCbslProvider, type CbslProviderOptions } from '../providers/cbsl/provider.js';
import { createHnbProvider } from '../providers/hnb/provider.js';
import { createPeoplesBankProvider } from '../providers/peoples-bank/provider.js';
import { createSampathProvider } from '../providers/sampath/provider.js';

import { createZonedClock } from './clock.js';
import { ExchangeRateService } from './exchange-rate-service.js';
import { PROVIDER_NAMES, type Clock, type IRateProvider, type ProviderName } from './types.js';

const logger = getLogger('ExchangeRateFactory');

/** Bank providers ignore the CBSL-only lookback setting */
export type ProviderFactoryOptions = CbslProviderOptions;

/**
 * Registry of available provider factories, in the order banks are listed
 */
const PROVIDER_FACTORIES = {
  cbsl: (options: ProviderFactoryOptions) => createCbslProvider(options),
  hnb: (options: ProviderFactoryOptions) => createHnbProvider(options),
  pb: (options: ProviderFactoryOptions) => createPeoplesBankProvider(options),
  sampath: (options: ProviderFactoryOptions) => createSampathProvider(options),
} as const satisfies Record<ProviderName, (options: ProviderFactoryOptions) => Result<IRateProvider, Error>>;

export interface ExchangeRateServiceConfig {
  /** Defaults to `<LKR_RATES_DATA_DIR>/exchange-rates.db` */
  databasePath?: string | undefined;
  /** Defaults to a clock in LKR_RATES_TIMEZONE */
  clock?: Clock | undefined;
  bulkWindowDays?: number | undefined;
  cbslLookbackDays?: number | undefined;
  /** Subset of providers to enable; all by default */
  providers?: readonly ProviderName[] | undefined;
  httpEffects?: ProviderFactoryOptions['httpEffects'];
}

/**
 * Build providers for the given names. Stops at the first provider that
 * cannot be created and releases those already built.
 */
export async function createRateProviders(
  names: readonly ProviderName[],
  options: ProviderFactoryOptions
): Promise<Result<Map<ProviderName, IRateProvider>, Error>> {
  const providers = new Map<ProviderName, IRateProvider>();

  for (const name of names) {
    const created = PROVIDER_FACTORIES[name](options);
    if (created.isErr()) {
      for (const provider of providers.values()) {
        await provider.destroy();
      }
      return err(created.error);
    }
    providers.set(name, created.value);
    logger.debug(`Registered provider ${name}`);
  }

  return ok(providers);
}

/**
 * Open (and migrate) the database, then wire the service
 */
export async function createExchangeRateService(
  config: ExchangeRateServiceConfig = {}
): Promise<Result<ExchangeRateService, Error>> {
  const databasePath = config.databasePath ?? getDatabasePath();
  const clock = config.clock ?? createZonedClock(getTimeZone());

  const dbResult = createExchangeRatesDatabase(databasePath);
  if (dbResult.isErr()) {
    return err(dbResult.error);
  }
  const db: ExchangeRatesDB = dbResult.value;

  const migrated = await initializeExchangeRatesDatabase(db);
  if (migrated.isErr()) {
    await closeSqliteDatabase(db);
    return err(migrated.error);
  }

  const providers = await createRateProviders(config.providers ?? PROVIDER_NAMES, {
    clock,
    httpEffects: config.httpEffects,
    lookbackDays: config.cbslLookbackDays ?? getCbslLookbackDays(),
  });
  if (providers.isErr()) {
    await closeSqliteDatabase(db);
    return err(providers.error);
  }

  const now = () => clock.now();
  return ok(
    new ExchangeRateService({
      bulkWindowDays: config.bulkWindowDays ?? getBulkWindowDays(),
      clock,
      onDestroy: async () => {
        const closed = await closeSqliteDatabase(db);
        if (closed.isErr()) {
          logger.error({ error: closed.error }, 'Failed to close exchange rates database');
        }
      },
      providers: providers.value,
      rates: new RateRepository(db, now),
      refreshLogs: new RefreshLogRepository(db, now),
    })
  );
}
