// Command registration for the single-date rate lookup

import type { Command } from 'commander';

import { applyVerboseFlag, runCommand, toError } from '../shared/command-runtime.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager, outputFormatFor } from '../shared/output.js';
import { formatResolutionDetails, toResolutionJson } from '../shared/rate-view-utils.js';
import { parseCommandInput, RateCommandInputSchema } from '../shared/schemas.js';

export function registerRateCommand(program: Command): void {
  program
    .command('rate')
    .description('Resolve the USD/LKR rate for a date')
    .argument('<date>', 'Date in YYYY-MM-DD format')
    .addHelpText(
      'after',
      `
Examples:
  $ lkr-rates rate 2025-11-21                   # Central bank rate (default)
  $ lkr-rates rate 2025-11-21 --provider hnb    # Hatton National Bank
  $ lkr-rates rate 2025-11-22 --json            # Machine-readable output

Lookup order: stored rate, one-time central bank backfill, live fetch,
then the nearest earlier stored rate (reported as approximated).
`
    )
    .option('--provider <name>', 'Rate source: cbsl, hnb, pb or sampath', 'cbsl')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log progress to stderr')
    .action(async (date: string, rawOptions: Record<string, unknown>) => {
      await executeRateCommand({ ...rawOptions, date });
    });
}

async function executeRateCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const output = new OutputManager(outputFormatFor(rawOptions));

  const input = parseCommandInput(RateCommandInputSchema, rawOptions);
  if (input.isErr()) {
    output.error('rate', input.error, ExitCodes.INVALID_ARGS);
    return;
  }

  const options = input.value;
  applyVerboseFlag(options.verbose);

  try {
    await runCommand(async (ctx) => {
      const service = await ctx.service();

      const spinner = output.spinner();
      spinner?.start(`Resolving ${options.provider} rate for ${options.date}`);
      const result = await service.resolve(options.provider, options.date);
      spinner?.stop();

      if (result.isErr()) {
        ctx.exitCode = output.report('rate', result.error, ExitCodes.GENERAL_ERROR);
        return;
      }

      const resolution = result.value;
      if (resolution.kind === 'not-found') {
        ctx.exitCode = output.report(
          'rate',
          new Error(`No ${options.provider} rate available on or before ${options.date}`),
          ExitCodes.NOT_FOUND
        );
        return;
      }

      output.note(formatResolutionDetails(resolution), `USD/LKR (${options.provider})`);
      output.json('rate', toResolutionJson(resolution));
    });
  } catch (error) {
    output.error('rate', toError(error), ExitCodes.GENERAL_ERROR);
  }
}
