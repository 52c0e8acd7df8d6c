/**
 * Scraper for the People's Bank exchange rates page
 */

import type { CalendarDate } from '@lkr-rates/core';
import { load } from 'cheerio';
import type { Result } from 'neverthrow';
import { err } from 'neverthrow';

import { RateSourceError } from '../../core/errors.js';
import { buildCandidate } from '../../core/rate-validation.js';
import type { RateCandidate } from '../../core/types.js';

const USD_LABEL = 'US Dollars';

// Zero-based <td> positions in the USD row
export const PB_BUY_COLUMN = 4;
export const PB_SELL_COLUMN = 5;

/**
 * Cell texts of the USD row, or undefined when the page has no such row
 */
export function findPeoplesBankUsdCells(html: string): string[] | undefined {
  const $ = load(html);

  let row = $('th[scope="row"]')
    .filter((_index, th) => $(th).text().includes(USD_LABEL))
    .first()
    .closest('tr');

  // Innermost row only; layout tables wrap the rates table in outer rows
  if (row.length === 0) {
    row = $('tr')
      .filter(
        (_index, tr) =>
          $(tr).text().includes(USD_LABEL) &&
          $(tr)
            .find('tr')
            .filter((_nestedIndex, nested) => $(nested).text().includes(USD_LABEL)).length === 0
      )
      .first();
  }

  if (row.length === 0) {
    return undefined;
  }

  return row
    .find('td')
    .map((_index, td) => $(td).text().trim())
    .get();
}

export function parsePeoplesBankPage(html: string, today: CalendarDate): Result<RateCandidate, RateSourceError> {
  const cells = findPeoplesBankUsdCells(html);
  if (!cells) {
    return err(
      new RateSourceError("US Dollars row not found on People's Bank page", 'not-found', 'pb', {
        expected: `<tr> containing "${USD_LABEL}"`,
      })
    );
  }

  const buyRate = cells[PB_BUY_COLUMN];
  const sellRate = cells[PB_SELL_COLUMN];
  if (buyRate === undefined || sellRate === undefined) {
    return err(
      new RateSourceError(
        `Expected at least ${PB_SELL_COLUMN + 1} <td> columns in USD row, found ${cells.length}`,
        'parse',
        'pb',
        { expected: `${PB_SELL_COLUMN + 1} columns`, received: cells.join(' | ') }
      )
    );
  }

  return buildCandidate({ buyRate, date: today, sellRate, source: 'PB' }, 'pb');
}
