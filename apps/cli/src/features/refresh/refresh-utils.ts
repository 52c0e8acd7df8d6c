// Utilities for the refresh and refresh-logs commands

import { formatRate, type CalendarDate } from '@lkr-rates/core';
import type { ProviderName, RateSource, RefreshLogEntry, RefreshOutcome } from '@lkr-rates/exchange-rates';

export type RefreshOutcomeJson =
  | {
      provider: ProviderName;
      source: RateSource;
      status: 'success';
      date: CalendarDate;
      buyRate: string;
      sellRate: string;
      durationMs: number;
    }
  | { provider: ProviderName; source: RateSource; status: 'failure'; error: string; durationMs: number };

export interface RefreshLogJson {
  id: number;
  source: RateSource;
  status: RefreshLogEntry['status'];
  buyRate: string | undefined;
  sellRate: string | undefined;
  errorMessage: string | undefined;
  durationMs: number;
  createdAt: string;
}

export function getStatusIcon(status: 'success' | 'failure'): string {
  return status === 'success' ? '✓' : '✗';
}

export function toRefreshOutcomeJson(outcome: RefreshOutcome): RefreshOutcomeJson {
  if (outcome.status === 'failure') {
    return outcome;
  }
  return {
    ...outcome,
    buyRate: formatRate(outcome.buyRate),
    sellRate: formatRate(outcome.sellRate),
  };
}

export function formatRefreshOutcomes(outcomes: readonly RefreshOutcome[]): string {
  const lines = outcomes.map((outcome) => {
    const label = `${getStatusIcon(outcome.status)} ${outcome.provider.padEnd(8)}`;
    const detail =
      outcome.status === 'success'
        ? `${outcome.date}  buy ${formatRate(outcome.buyRate)}  sell ${formatRate(outcome.sellRate)}`
        : outcome.error;
    return `${label}${detail}  (${outcome.durationMs}ms)`;
  });

  const succeeded = outcomes.filter((outcome) => outcome.status === 'success').length;
  lines.push('', `${succeeded} of ${outcomes.length} sources refreshed`);
  return lines.join('\n');
}

export function toRefreshLogJson(entry: RefreshLogEntry): RefreshLogJson {
  return {
    buyRate: entry.buyRate ? formatRate(entry.buyRate) : undefined,
    createdAt: entry.createdAt.toISOString(),
    durationMs: entry.durationMs,
    errorMessage: entry.errorMessage,
    id: entry.id,
    sellRate: entry.sellRate ? formatRate(entry.sellRate) : undefined,
    source: entry.source,
    status: entry.status,
  };
}

/**
 * One line per attempt, newest first
 */
export function formatRefreshLogsForDisplay(entries: readonly RefreshLogEntry[]): string {
  if (entries.length === 0) {
    return 'No refresh attempts recorded.';
  }

  return entries
    .map((entry) => {
      const detail =
        entry.status === 'success' && entry.buyRate && entry.sellRate
          ? `buy ${formatRate(entry.buyRate)}  sell ${formatRate(entry.sellRate)}`
          : (entry.errorMessage ?? 'no details');
      return `${entry.createdAt.toISOString()}  ${getStatusIcon(entry.status)} ${entry.source.padEnd(10)}${detail}  (${entry.durationMs}ms)`;
    })
    .join('\n');
}
