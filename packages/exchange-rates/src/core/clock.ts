import { todayInTimeZone } from '@lkr-rates/core';

import type { Clock } from './types.js';

/**
 * Wall clock whose "today" follows the given IANA time zone
 */
export function createZonedClock(timeZone: string, now: () => Date = () => new Date()): Clock {
  return {
    now,
    today: () => todayInTimeZone(timeZone, now()),
  };
}
