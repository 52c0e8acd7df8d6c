// Command registration for the bank comparison

import type { Command } from 'commander';

import { applyVerboseFlag, runCommand, toError } from '../shared/command-runtime.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager, outputFormatFor } from '../shared/output.js';
import { BanksCommandInputSchema, parseCommandInput } from '../shared/schemas.js';

import { formatBanksForDisplay, toBanksJson } from './banks-utils.js';

export function registerBanksCommand(program: Command): void {
  program
    .command('banks')
    .description('Compare every source for one date')
    .argument('[date]', 'Date in YYYY-MM-DD format (default: today)')
    .addHelpText(
      'after',
      `
Examples:
  $ lkr-rates banks                  # Today's rates from every source
  $ lkr-rates banks 2025-11-20       # Stored or nearest rates for a past date

Sources that fail or have no rate are left out.
`
    )
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log progress to stderr')
    .action(async (date: string | undefined, rawOptions: Record<string, unknown>) => {
      await executeBanksCommand(date === undefined ? rawOptions : { ...rawOptions, date });
    });
}

async function executeBanksCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const output = new OutputManager(outputFormatFor(rawOptions));

  const input = parseCommandInput(BanksCommandInputSchema, rawOptions);
  if (input.isErr()) {
    output.error('banks', input.error, ExitCodes.INVALID_ARGS);
    return;
  }

  const options = input.value;
  applyVerboseFlag(options.verbose);

  try {
    await runCommand(async (ctx) => {
      const service = await ctx.service();
      const date = options.date ?? service.today();

      const spinner = output.spinner();
      spinner?.start(`Comparing sources for ${date}`);
      const result = await service.resolveAllBanks(date);
      spinner?.stop();

      if (result.isErr()) {
        ctx.exitCode = output.report('banks', result.error, ExitCodes.GENERAL_ERROR);
        return;
      }

      output.text(formatBanksForDisplay(date, result.value));
      output.json('banks', toBanksJson(date, result.value));

      if (result.value.length === 0) {
        ctx.exitCode = ExitCodes.NOT_FOUND;
      }
    });
  } catch (error) {
    output.error('banks', toError(error), ExitCodes.GENERAL_ERROR);
  }
}
