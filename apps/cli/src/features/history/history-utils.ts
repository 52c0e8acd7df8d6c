// Utilities for the stored rate history

import { formatRate, type CalendarDate } from '@lkr-rates/core';
import type { ProviderName, RateRecord } from '@lkr-rates/exchange-rates';

import { formatRateTable, recordToRow, toRateRecordJson, type RateRecordJson } from '../shared/rate-view-utils.js';

export interface HistoryJson {
  provider: ProviderName;
  start: CalendarDate;
  end: CalendarDate;
  count: number;
  rates: RateRecordJson[];
}

export interface SellRateChange {
  from: CalendarDate;
  to: CalendarDate;
  /** Last sell rate minus first, four decimals, signed */
  change: string;
}

/**
 * Sell-rate movement between the first and last stored rows
 */
export function computeSellRateChange(records: readonly RateRecord[]): SellRateChange | undefined {
  const first = records[0];
  const last = records.at(-1);
  if (!first || !last || first === last) {
    return undefined;
  }

  const delta = last.sellRate.minus(first.sellRate);
  return {
    change: delta.isNegative() ? formatRate(delta) : `+${formatRate(delta)}`,
    from: first.date,
    to: last.date,
  };
}

export function toHistoryJson(
  provider: ProviderName,
  start: CalendarDate,
  end: CalendarDate,
  records: readonly RateRecord[]
): HistoryJson {
  return { count: records.length, end, provider, rates: records.map(toRateRecordJson), start };
}

export function formatHistoryForDisplay(records: readonly RateRecord[]): string {
  if (records.length === 0) {
    return 'No stored rates in this range.';
  }

  const lines = [formatRateTable('Date', records.map(recordToRow)), '', `${records.length} stored rates`];
  const change = computeSellRateChange(records);
  if (change) {
    lines.push(`Sell rate change ${change.from} to ${change.to}: ${change.change}`);
  }
  return lines.join('\n');
}
