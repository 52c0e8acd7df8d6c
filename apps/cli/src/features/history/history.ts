// Command registration for the stored rate history

import { addDays } from '@lkr-rates/core';
import type { Command } from 'commander';

import { applyVerboseFlag, runCommand, toError } from '../shared/command-runtime.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager, outputFormatFor } from '../shared/output.js';
import { HistoryCommandInputSchema, parseCommandInput } from '../shared/schemas.js';

import { formatHistoryForDisplay, toHistoryJson } from './history-utils.js';

export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('List stored rates without fetching')
    .addHelpText(
      'after',
      `
Examples:
  $ lkr-rates history                                   # Last 30 days of central bank rates
  $ lkr-rates history --days 7 --provider hnb           # Last week of HNB rates
  $ lkr-rates history --from 2025-10-01 --to 2025-10-31 # A fixed range
`
    )
    .option('--provider <name>', 'Rate source: cbsl, hnb, pb or sampath', 'cbsl')
    .option('--days <n>', 'Trailing days ending today', '30')
    .option('--from <date>', 'Range start (YYYY-MM-DD), with --to')
    .option('--to <date>', 'Range end (YYYY-MM-DD), with --from')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log progress to stderr')
    .action(async (rawOptions: Record<string, unknown>) => {
      await executeHistoryCommand(rawOptions);
    });
}

async function executeHistoryCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const output = new OutputManager(outputFormatFor(rawOptions));

  const input = parseCommandInput(HistoryCommandInputSchema, rawOptions);
  if (input.isErr()) {
    output.error('history', input.error, ExitCodes.INVALID_ARGS);
    return;
  }

  const options = input.value;
  applyVerboseFlag(options.verbose);

  try {
    await runCommand(async (ctx) => {
      const service = await ctx.service();
      const end = options.to ?? service.today();
      const start = options.from ?? addDays(end, -(options.days - 1));

      const result = await service.listRates(options.provider, start, end);
      if (result.isErr()) {
        ctx.exitCode = output.report('history', result.error, ExitCodes.DATABASE_ERROR);
        return;
      }

      output.text(formatHistoryForDisplay(result.value));
      output.json('history', toHistoryJson(options.provider, start, end, result.value));
    });
  } catch (error) {
    output.error('history', toError(error), ExitCodes.GENERAL_ERROR);
  }
}
