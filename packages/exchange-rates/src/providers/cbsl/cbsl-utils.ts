/**
 * Pure helpers for the CBSL daily exchange rate form
 */

import { parseCalendarDate, type CalendarDate } from '@lkr-rates/core';
import type { FormFields } from '@lkr-rates/http';
import { load } from 'cheerio';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { RateSourceError } from '../../core/errors.js';

/** Earliest date the CBSL form accepts */
export const CBSL_MIN_DATE = '2006-11-11';

export const CBSL_USD_CURRENCY = 'USD~United States Dollar';

export interface CbslRow {
  date: CalendarDate;
  buyRate: string;
  sellRate: string;
}

export interface CbslTable {
  rows: CbslRow[];
  /** Rows with fewer than three cells or an unparsable date */
  invalidRows: number;
}

export function buildCbslFormFields(start: CalendarDate, end: CalendarDate): FormFields {
  return {
    'chk_cur[]': [CBSL_USD_CURRENCY],
    lookupPage: 'lookup_daily_exchange_rates.php',
    rangeType: 'range',
    rangeValue: '1',
    startRange: CBSL_MIN_DATE,
    submit_button: 'Submit',
    txtEnd: end,
    txtStart: start,
  };
}

/**
 * Extract `[date, buy, sell]` rows from `table.table tr.odd`.
 * A page without the rates table is a parse failure; a table without rows is not.
 */
export function parseCbslTable(html: string): Result<CbslTable, RateSourceError> {
  const $ = load(html);
  const table = $('table.table').first();

  if (table.length === 0) {
    return err(
      new RateSourceError('Could not find exchange rate table in CBSL response', 'parse', 'cbsl', {
        expected: 'table.table',
        received: html.slice(0, 200),
      })
    );
  }

  const rows: CbslRow[] = [];
  let invalidRows = 0;

  table.find('tr.odd').each((_index, element) => {
    const cells = $(element)
      .find('td')
      .map((_cellIndex, cell) => $(cell).text().trim())
      .get();

    const [dateText, buyRate, sellRate] = cells;
    if (dateText === undefined || buyRate === undefined || sellRate === undefined) {
      invalidRows++;
      return;
    }

    const date = parseCalendarDate(dateText);
    if (date.isErr()) {
      invalidRows++;
      return;
    }

    rows.push({ buyRate, date: date.value, sellRate });
  });

  return ok({ invalidRows, rows });
}

/**
 * Row for the target date, or the latest earlier row when the exact date is absent
 */
export function selectRowForDate(rows: CbslRow[], target: CalendarDate): CbslRow | undefined {
  let nearest: CbslRow | undefined;

  for (const row of rows) {
    if (row.date === target) {
      return row;
    }
    if (row.date < target && (nearest === undefined || row.date > nearest.date)) {
      nearest = row;
    }
  }

  return nearest;
}
