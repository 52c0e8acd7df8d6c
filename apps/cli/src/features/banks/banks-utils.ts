// Utilities for the bank comparison view

import { formatRate, type CalendarDate } from '@lkr-rates/core';
import type { FoundRateResolution } from '@lkr-rates/exchange-rates';

import { formatRateTable, resolutionToRow, toResolutionJson, type ResolutionJson } from '../shared/rate-view-utils.js';

export interface BestRates {
  /** Highest price a source pays for USD */
  bestBuy: FoundRateResolution | undefined;
  /** Lowest price a source charges for USD */
  bestSell: FoundRateResolution | undefined;
}

export interface BanksJson {
  date: CalendarDate;
  rates: ResolutionJson[];
  bestBuy: string | undefined;
  bestSell: string | undefined;
}

export function findBestRates(resolutions: readonly FoundRateResolution[]): BestRates {
  let bestBuy: FoundRateResolution | undefined;
  let bestSell: FoundRateResolution | undefined;

  for (const resolution of resolutions) {
    if (!bestBuy || resolution.rate.buyRate.greaterThan(bestBuy.rate.buyRate)) {
      bestBuy = resolution;
    }
    if (!bestSell || resolution.rate.sellRate.lessThan(bestSell.rate.sellRate)) {
      bestSell = resolution;
    }
  }

  return { bestBuy, bestSell };
}

export function toBanksJson(date: CalendarDate, resolutions: readonly FoundRateResolution[]): BanksJson {
  const { bestBuy, bestSell } = findBestRates(resolutions);
  return {
    bestBuy: bestBuy?.provider,
    bestSell: bestSell?.provider,
    date,
    rates: resolutions.map(toResolutionJson),
  };
}

export function formatBanksForDisplay(date: CalendarDate, resolutions: readonly FoundRateResolution[]): string {
  if (resolutions.length === 0) {
    return `No bank has a rate for ${date}.`;
  }

  const rows = resolutions.map((resolution) => resolutionToRow(resolution.provider, resolution));
  const { bestBuy, bestSell } = findBestRates(resolutions);
  const lines = [formatRateTable('Bank', rows), ''];

  if (bestBuy) {
    lines.push(`Best buy:  ${bestBuy.provider} ${formatRate(bestBuy.rate.buyRate)}`);
  }
  if (bestSell) {
    lines.push(`Best sell: ${bestSell.provider} ${formatRate(bestSell.rate.sellRate)}`);
  }
  if (resolutions.some((resolution) => resolution.kind === 'approximated')) {
    lines.push('* rate carried over from an earlier date');
  }
  return lines.join('\n');
}
