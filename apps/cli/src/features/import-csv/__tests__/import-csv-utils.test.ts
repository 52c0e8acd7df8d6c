import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { CsvFileNotFoundError, formatImportSummary, readCsvFile } from '../import-csv-utils.js';

describe('readCsvFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'lkr-rates-csv-'));
  });

  afterEach(async () => {
    await rm(dir, { force: true, recursive: true });
  });

  it('returns the file content', async () => {
    const file = path.join(dir, 'rates.csv');
    await writeFile(file, 'date,buy rate,sell rate\n2025-11-21,304.2758,311.8332\n', 'utf8');

    const content = (await readCsvFile(file))._unsafeUnwrap();

    expect(content).toBe('date,buy rate,sell rate\n2025-11-21,304.2758,311.8332\n');
  });

  it('reports a missing file as not found', async () => {
    const file = path.join(dir, 'missing.csv');

    const error = (await readCsvFile(file))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(CsvFileNotFoundError);
    expect(error.message).toBe(`CSV file not found: ${file}`);
  });
});

describe('formatImportSummary', () => {
  it('lists skipped rows under the totals', () => {
    const text = formatImportSummary({
      imported: 2,
      skipped: [{ reason: 'Invalid date "21/11/2025". Use YYYY-MM-DD', row: 3 }],
      totalParsed: 3,
    });

    expect(text.split('\n')).toEqual([
      'Imported 2 rates (3 rows parsed, 1 skipped)',
      '  row 3: Invalid date "21/11/2025". Use YYYY-MM-DD',
    ]);
  });
});
