// Command registration for import-csv

import type { Command } from 'commander';

import { applyVerboseFlag, runCommand, toError } from '../shared/command-runtime.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager, outputFormatFor } from '../shared/output.js';
import { ImportCsvCommandInputSchema, parseCommandInput } from '../shared/schemas.js';

import { CsvFileNotFoundError, formatImportSummary, readCsvFile } from './import-csv-utils.js';

export function registerImportCsvCommand(program: Command): void {
  program
    .command('import-csv')
    .description('Import central bank rate history from a CSV export')
    .argument('<file>', 'CSV file with date, buy rate and sell rate columns')
    .addHelpText(
      'after',
      `
Examples:
  $ lkr-rates import-csv ./cbsl-usd-2024.csv

Columns are matched by header text. When a date appears twice the last
row wins. Rows with a bad date or a non-positive rate are skipped and listed.
`
    )
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log progress to stderr')
    .action(async (file: string, rawOptions: Record<string, unknown>) => {
      await executeImportCsvCommand({ ...rawOptions, file });
    });
}

async function executeImportCsvCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const output = new OutputManager(outputFormatFor(rawOptions));

  const input = parseCommandInput(ImportCsvCommandInputSchema, rawOptions);
  if (input.isErr()) {
    output.error('import-csv', input.error, ExitCodes.INVALID_ARGS);
    return;
  }

  const options = input.value;
  applyVerboseFlag(options.verbose);

  const content = await readCsvFile(options.file);
  if (content.isErr()) {
    output.error(
      'import-csv',
      content.error,
      content.error instanceof CsvFileNotFoundError ? ExitCodes.NOT_FOUND : ExitCodes.GENERAL_ERROR
    );
    return;
  }
  const csv = content.value;

  try {
    await runCommand(async (ctx) => {
      const service = await ctx.service();

      const result = await service.importCsv(csv);
      if (result.isErr()) {
        ctx.exitCode = output.report('import-csv', result.error, ExitCodes.VALIDATION_ERROR);
        return;
      }

      output.text(formatImportSummary(result.value));
      output.json('import-csv', result.value);
    });
  } catch (error) {
    output.error('import-csv', toError(error), ExitCodes.GENERAL_ERROR);
  }
}
