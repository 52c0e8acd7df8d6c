/**
 * Calendar dates (YYYY-MM-DD) with no time-of-day or time zone attached.
 *
 * Arithmetic runs on UTC midnight so daylight-saving shifts never move a date.
 */

import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function isRealDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return (
    date.getUTCFullYear() === Number(year) &&
    date.getUTCMonth() === Number(month) - 1 &&
    date.getUTCDate() === Number(day)
  );
}

export const CalendarDateSchema = z
  .string()
  .regex(ISO_DATE_PATTERN, { message: 'Expected date in YYYY-MM-DD format' })
  .refine(isRealDate, { message: 'Not a valid calendar date' })
  .brand<'CalendarDate'>();

export type CalendarDate = z.infer<typeof CalendarDateSchema>;

/**
 * Parse user or upstream input into a calendar date
 */
export function parseCalendarDate(value: string): Result<CalendarDate, Error> {
  const result = CalendarDateSchema.safeParse(value.trim());
  if (!result.success) {
    return err(new Error(`Invalid date "${value}". Use YYYY-MM-DD`));
  }
  return ok(result.data);
}

/**
 * Calendar date of a Date's UTC components
 */
export function calendarDateFromUtc(date: Date): CalendarDate {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return CalendarDateSchema.parse(`${year}-${month}-${day}`);
}

export function calendarDateToUtc(date: CalendarDate): Date {
  return new Date(`${date}T00:00:00.000Z`);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const result = calendarDateToUtc(date);
  result.setUTCDate(result.getUTCDate() + days);
  return calendarDateFromUtc(result);
}

/**
 * Negative when a is before b. ISO strings sort chronologically.
 */
export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Every date from start to end inclusive. Empty when start is after end.
 */
export function eachDayInRange(start: CalendarDate, end: CalendarDate): CalendarDate[] {
  const days: CalendarDate[] = [];
  for (let current = start; current <= end; current = addDays(current, 1)) {
    days.push(current);
  }
  return days;
}

export function daysInMonth(year: number, month: number): CalendarDate[] {
  const first = calendarDateFromUtc(new Date(Date.UTC(year, month - 1, 1)));
  const last = calendarDateFromUtc(new Date(Date.UTC(year, month, 0)));
  return eachDayInRange(first, last);
}

/**
 * Today's calendar date in an IANA time zone
 */
export function todayInTimeZone(timeZone: string, now: Date = new Date()): CalendarDate {
  const parts = new Intl.DateTimeFormat('en-CA', {
    day: '2-digit',
    month: '2-digit',
    timeZone,
    year: 'numeric',
  }).formatToParts(now);

  const lookup = (type: Intl.DateTimeFormatPartTypes): string => parts.find((part) => part.type === type)?.value ?? '';
  return CalendarDateSchema.parse(`${lookup('year')}-${lookup('month')}-${lookup('day')}`);
}
