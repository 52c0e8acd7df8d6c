// Shared text and JSON views of resolved and stored rates

import { formatRate, type CalendarDate } from '@lkr-rates/core';
import type { FoundRateResolution, ProviderName, RateOrigin, RateRecord, RateSource } from '@lkr-rates/exchange-rates';

/**
 * Resolution as printed in --json mode. Rates are strings with four decimals.
 */
export interface ResolutionJson {
  provider: ProviderName;
  requestedDate: CalendarDate;
  kind: FoundRateResolution['kind'];
  date: CalendarDate;
  buyRate: string;
  sellRate: string;
  source: RateSource;
  origin: RateOrigin;
  note?: string;
}

export interface RateRecordJson {
  date: CalendarDate;
  buyRate: string;
  sellRate: string;
  source: RateSource;
  updatedAt: string;
}

export function toResolutionJson(resolution: FoundRateResolution): ResolutionJson {
  const { rate } = resolution;
  const json: ResolutionJson = {
    buyRate: formatRate(rate.buyRate),
    date: rate.date,
    kind: resolution.kind,
    origin: rate.origin,
    provider: resolution.provider,
    requestedDate: rate.requestedDate,
    sellRate: formatRate(rate.sellRate),
    source: rate.source,
  };
  if (resolution.kind === 'approximated') {
    json.note = resolution.note;
  }
  return json;
}

export function toRateRecordJson(record: RateRecord): RateRecordJson {
  return {
    buyRate: formatRate(record.buyRate),
    date: record.date,
    sellRate: formatRate(record.sellRate),
    source: record.source,
    updatedAt: record.updatedAt.toISOString(),
  };
}

/**
 * Labelled block for a single resolution
 */
export function formatResolutionDetails(resolution: FoundRateResolution): string {
  const { rate } = resolution;
  const lines = [
    `Date:      ${rate.requestedDate}`,
    `Buy rate:  ${formatRate(rate.buyRate)} LKR`,
    `Sell rate: ${formatRate(rate.sellRate)} LKR`,
    `Source:    ${rate.source} (${rate.origin})`,
  ];
  if (resolution.kind === 'approximated') {
    lines.push(`Note:      ${resolution.note}`);
  }
  return lines.join('\n');
}

export interface RateTableRow {
  label: string;
  buyRate: string;
  sellRate: string;
  source: string;
  /** Marks rows whose rate comes from another date */
  approximated?: boolean | undefined;
}

/**
 * Fixed-width table. Approximated rows end with `*`.
 */
export function formatRateTable(firstColumn: string, rows: readonly RateTableRow[]): string {
  const labelWidth = Math.max(firstColumn.length, ...rows.map((row) => row.label.length)) + 2;
  const header = `${firstColumn.padEnd(labelWidth)}${'Buy'.padStart(10)}  ${'Sell'.padStart(10)}  Source`;
  const lines = rows.map((row) => {
    const line = `${row.label.padEnd(labelWidth)}${row.buyRate.padStart(10)}  ${row.sellRate.padStart(10)}  ${row.source}`;
    return row.approximated ? `${line} *` : line;
  });
  return [header, ...lines].join('\n');
}

export function resolutionToRow(label: string, resolution: FoundRateResolution): RateTableRow {
  return {
    approximated: resolution.kind === 'approximated',
    buyRate: formatRate(resolution.rate.buyRate),
    label,
    sellRate: formatRate(resolution.rate.sellRate),
    source: resolution.rate.source,
  };
}

export function recordToRow(record: RateRecord): RateTableRow {
  return {
    buyRate: formatRate(record.buyRate),
    label: record.date,
    sellRate: formatRate(record.sellRate),
    source: record.source,
  };
}
