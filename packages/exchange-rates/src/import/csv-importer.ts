/**
 * Parser for CBSL rate history exported as CSV
 *
 * Columns are located by header text (case-insensitive): one containing
 * "date", one containing "buy" and "rate", one containing "sell" and "rate".
 */

import { parseCalendarDate, wrapError, type CalendarDate } from '@lkr-rates/core';
import { getLogger } from '@lkr-rates/logger';
import { parse } from 'csv-parse/sync';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

import { buildCandidate } from '../core/rate-validation.js';
import type { RateCandidate } from '../core/types.js';

const logger = getLogger('CsvImporter');

const CsvRecordsSchema = z.array(z.array(z.string()));

export interface CsvRowIssue {
  /** 1-based data row number (header excluded) */
  row: number;
  reason: string;
}

export interface CsvParseResult {
  /** One candidate per date; later rows replace earlier ones */
  rates: Map<CalendarDate, RateCandidate>;
  skipped: CsvRowIssue[];
  totalRows: number;
}

interface ColumnIndexes {
  date: number;
  buy: number;
  sell: number;
}

export function locateColumns(header: readonly string[]): Result<ColumnIndexes, Error> {
  let date: number | undefined;
  let buy: number | undefined;
  let sell: number | undefined;

  for (const [index, name] of header.entries()) {
    const key = name.toLowerCase().trim();
    if (key.includes('date')) {
      date ??= index;
    } else if (key.includes('buy') && key.includes('rate')) {
      buy ??= index;
    } else if (key.includes('sell') && key.includes('rate')) {
      sell ??= index;
    }
  }

  const missing = [
    date === undefined ? 'date' : undefined,
    buy === undefined ? 'buy rate' : undefined,
    sell === undefined ? 'sell rate' : undefined,
  ].filter((name) => name !== undefined);

  if (date === undefined || buy === undefined || sell === undefined) {
    return err(new Error(`CSV is missing required columns: ${missing.join(', ')}`));
  }

  return ok({ buy, date, sell });
}

/**
 * Parse CSV text into rate candidates tagged `CSV`. Bad rows are skipped and
 * reported; a missing required column fails the whole input.
 */
export function parseExchangeRateCsv(content: string): Result<CsvParseResult, Error> {
  let parsed: unknown;
  try {
    parsed = parse(content, {
      bom: true,
      relax_column_count: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    return wrapError(error, 'Failed to parse CSV');
  }

  const records = CsvRecordsSchema.safeParse(parsed);
  if (!records.success) {
    return err(new Error('Failed to parse CSV: unexpected record shape'));
  }

  const [header, ...rows] = records.data;
  if (!header) {
    return err(new Error('CSV is empty'));
  }

  const columns = locateColumns(header);
  if (columns.isErr()) {
    return err(columns.error);
  }

  const rates = new Map<CalendarDate, RateCandidate>();
  const skipped: CsvRowIssue[] = [];

  rows.forEach((cells, index) => {
    const row = index + 1;
    const date = parseCalendarDate(cells[columns.value.date] ?? '');
    if (date.isErr()) {
      skipped.push({ reason: date.error.message, row });
      return;
    }

    const candidate = buildCandidate(
      {
        buyRate: cells[columns.value.buy],
        date: date.value,
        sellRate: cells[columns.value.sell],
        source: 'CSV',
      },
      'csv'
    );
    if (candidate.isErr()) {
      skipped.push({ reason: candidate.error.message, row });
      return;
    }

    rates.set(date.value, candidate.value);
  });

  for (const issue of skipped) {
    logger.warn(`Skipping CSV row ${issue.row}: ${issue.reason}`);
  }

  return ok({ rates, skipped, totalRows: rows.length });
}
