// Utilities for the CSV import command

import { promises as fs } from 'node:fs';

import { getErrorMessage, isRecord } from '@lkr-rates/core';
import type { CsvImportSummary } from '@lkr-rates/exchange-rates';
import { err, ok, type Result } from 'neverthrow';

export class CsvFileNotFoundError extends Error {
  constructor(readonly filePath: string) {
    super(`CSV file not found: ${filePath}`);
    this.name = 'CsvFileNotFoundError';
  }
}

export async function readCsvFile(filePath: string): Promise<Result<string, Error>> {
  try {
    return ok(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    if (isRecord(error) && error['code'] === 'ENOENT') {
      return err(new CsvFileNotFoundError(filePath));
    }
    return err(new Error(`Failed to read ${filePath}: ${getErrorMessage(error)}`));
  }
}

export function formatImportSummary(summary: CsvImportSummary): string {
  const lines = [
    `Imported ${summary.imported} rates (${summary.totalParsed} rows parsed, ${summary.skipped.length} skipped)`,
  ];
  for (const issue of summary.skipped) {
    lines.push(`  row ${issue.row}: ${issue.reason}`);
  }
  return lines.join('\n');
}
