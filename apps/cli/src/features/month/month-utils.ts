// Utilities and types for the month command

import { compareCalendarDates, type CalendarDate } from '@lkr-rates/core';
import type { MonthRates, ProviderName } from '@lkr-rates/exchange-rates';

import { formatRateTable, resolutionToRow, toResolutionJson, type ResolutionJson } from '../shared/rate-view-utils.js';

export interface MonthRatesJson {
  provider: ProviderName;
  year: number;
  month: number;
  rates: ResolutionJson[];
  missing: CalendarDate[];
  skippedFuture: CalendarDate[];
  summary: MonthSummary;
}

export interface MonthSummary {
  totalDays: number;
  resolved: number;
  approximated: number;
  missing: number;
  future: number;
}

export function summarizeMonth(month: MonthRates): MonthSummary {
  const resolved = [...month.rates.values()];
  return {
    approximated: resolved.filter((resolution) => resolution.kind === 'approximated').length,
    future: month.skippedFuture.length,
    missing: month.missing.length,
    resolved: resolved.length,
    totalDays: resolved.length + month.missing.length + month.skippedFuture.length,
  };
}

export function toMonthRatesJson(provider: ProviderName, month: MonthRates): MonthRatesJson {
  return {
    missing: month.missing,
    month: month.month,
    provider,
    rates: [...month.rates.values()].map(toResolutionJson),
    skippedFuture: month.skippedFuture,
    summary: summarizeMonth(month),
    year: month.year,
  };
}

/**
 * Table of resolved days in date order, then a one-line summary
 */
export function formatMonthForDisplay(month: MonthRates): string {
  const rows = [...month.rates.entries()]
    .sort(([a], [b]) => compareCalendarDates(a, b))
    .map(([date, resolution]) => resolutionToRow(date, resolution));

  const summary = summarizeMonth(month);
  const lines = [
    rows.length > 0 ? formatRateTable('Date', rows) : 'No rates resolved.',
    '',
    `${summary.resolved} of ${summary.totalDays} days resolved (${summary.approximated} approximated, ${summary.missing} missing, ${summary.future} in the future)`,
  ];
  if (summary.approximated > 0) {
    lines.push('* rate carried over from an earlier date');
  }
  if (month.missing.length > 0) {
    lines.push(`Missing: ${month.missing.join(', ')}`);
  }
  return lines.join('\n');
}
