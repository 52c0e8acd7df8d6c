import { CalendarDateSchema, parseDecimal, type CalendarDate } from '@lkr-rates/core';
import type { FoundRateResolution, ProviderName, RateOrigin, RateRecord, RateSource } from '@lkr-rates/exchange-rates';

export function day(value: string): CalendarDate {
  return CalendarDateSchema.parse(value);
}

export function createResolution(params: {
  provider: ProviderName;
  requestedDate: string;
  date?: string;
  buyRate: string;
  sellRate: string;
  source: RateSource;
  origin: RateOrigin;
}): FoundRateResolution {
  const rate = {
    buyRate: parseDecimal(params.buyRate),
    date: day(params.date ?? params.requestedDate),
    origin: params.origin,
    requestedDate: day(params.requestedDate),
    sellRate: parseDecimal(params.sellRate),
    source: params.source,
  };

  if (rate.date === rate.requestedDate) {
    return { kind: 'exact', provider: params.provider, rate };
  }
  return {
    kind: 'approximated',
    note: `Rate from ${rate.date} (nearest available date)`,
    provider: params.provider,
    rate,
  };
}

export function createRecord(date: string, buyRate: string, sellRate: string, source: RateSource): RateRecord {
  const timestamp = new Date(`${date}T06:30:00.000Z`);
  return {
    buyRate: parseDecimal(buyRate),
    createdAt: timestamp,
    date: day(date),
    sellRate: parseDecimal(sellRate),
    source,
    updatedAt: timestamp,
  };
}
