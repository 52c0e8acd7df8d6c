// Command registration for the month view

import type { Command } from 'commander';

import { applyVerboseFlag, runCommand, toError } from '../shared/command-runtime.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager, outputFormatFor } from '../shared/output.js';
import { MonthCommandInputSchema, parseCommandInput } from '../shared/schemas.js';

import { formatMonthForDisplay, toMonthRatesJson } from './month-utils.js';

export function registerMonthCommand(program: Command): void {
  program
    .command('month')
    .description('Resolve every day of a month')
    .argument('<year>', 'Four-digit year')
    .argument('<month>', 'Month number, 1-12')
    .addHelpText(
      'after',
      `
Examples:
  $ lkr-rates month 2025 10                     # Central bank rates for October 2025
  $ lkr-rates month 2025 11 --provider sampath  # Sampath Bank, days up to today

Days after today are skipped. Days are resolved one after another, so a
cold store triggers at most one central bank backfill.
`
    )
    .option('--provider <name>', 'Rate source: cbsl, hnb, pb or sampath', 'cbsl')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log progress to stderr')
    .action(async (year: string, month: string, rawOptions: Record<string, unknown>) => {
      await executeMonthCommand({ ...rawOptions, month, year });
    });
}

async function executeMonthCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const output = new OutputManager(outputFormatFor(rawOptions));

  const input = parseCommandInput(MonthCommandInputSchema, rawOptions);
  if (input.isErr()) {
    output.error('month', input.error, ExitCodes.INVALID_ARGS);
    return;
  }

  const options = input.value;
  applyVerboseFlag(options.verbose);

  try {
    await runCommand(async (ctx) => {
      const service = await ctx.service();

      const spinner = output.spinner();
      spinner?.start(`Resolving ${options.provider} rates for ${options.year}-${String(options.month).padStart(2, '0')}`);
      const result = await service.resolveMonth(options.provider, options.year, options.month);
      spinner?.stop();

      if (result.isErr()) {
        ctx.exitCode = output.report('month', result.error, ExitCodes.GENERAL_ERROR);
        return;
      }

      output.text(formatMonthForDisplay(result.value));
      output.json('month', toMonthRatesJson(options.provider, result.value));
    });
  } catch (error) {
    output.error('month', toError(error), ExitCodes.GENERAL_ERROR);
  }
}
