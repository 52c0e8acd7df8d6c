export { createZonedClock } from './core/clock.js';
export { RateSourceError, type RateSourceErrorKind } from './core/errors.js';
export {
  ExchangeRateService,
  type CacheRangeSummary,
  type CsvImportSummary,
  type ExchangeRateServiceDeps,
  type MonthRates,
  type RefreshOutcome,
} from './core/exchange-rate-service.js';
export {
  createExchangeRateService,
  createRateProviders,
  type ExchangeRateServiceConfig,
  type ProviderFactoryOptions,
} from './core/factory.js';
export { DEFAULT_BULK_WINDOW_DAYS, RateResolver, type RateResolverOptions } from './core/rate-resolver.js';
export { buildCandidate, nearestDateNote, validateCandidate } from './core/rate-validation.js';
export {
  PROVIDER_NAMES,
  RATE_SOURCES,
  isProviderName,
  isRateSource,
  supportsBulkRange,
  supportsHistoricalLookup,
  type Clock,
  type FoundRateResolution,
  type IBulkRateProvider,
  type IHistoricalRateProvider,
  type IRateProvider,
  type ProviderName,
  type RateCandidate,
  type RateOrigin,
  type RateProviderMetadata,
  type RateRecord,
  type RateResolution,
  type RateSource,
  type ResolvedRate,
} from './core/types.js';
export { parseExchangeRateCsv, type CsvParseResult, type CsvRowIssue } from './import/csv-importer.js';
export {
  createExchangeRatesDatabase,
  initializeExchangeRatesDatabase,
  type ExchangeRatesDB,
  type ExchangeRatesDatabase,
} from './persistence/database.js';
export { RateRepository } from './persistence/repositories/rate-repository.js';
export { RefreshLogRepository, type RefreshLogEntry } from './persistence/repositories/refresh-log-repository.js';
