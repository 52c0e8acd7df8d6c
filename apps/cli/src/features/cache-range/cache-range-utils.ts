import type { CacheRangeSummary } from '@lkr-rates/exchange-rates';

export function formatCacheRangeSummary(summary: CacheRangeSummary): string {
  return [
    `Range:          ${summary.start} to ${summary.end} (${summary.totalDates} days)`,
    `Already cached: ${summary.alreadyCached}`,
    `Newly cached:   ${summary.newlyCached}`,
    `Approximated:   ${summary.approximated}`,
    `Failed:         ${summary.failed}`,
  ].join('\n');
}
