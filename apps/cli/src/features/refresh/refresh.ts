// Command registration for refresh and refresh-logs

import type { Command } from 'commander';

import { applyVerboseFlag, runCommand, toError } from '../shared/command-runtime.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager, outputFormatFor } from '../shared/output.js';
import { parseCommandInput, RefreshCommandInputSchema, RefreshLogsCommandInputSchema } from '../shared/schemas.js';

import {
  formatRefreshLogsForDisplay,
  formatRefreshOutcomes,
  toRefreshLogJson,
  toRefreshOutcomeJson,
} from './refresh-utils.js';

export function registerRefreshCommand(program: Command): void {
  program
    .command('refresh')
    .description("Fetch and store today's rate from every source")
    .addHelpText(
      'after',
      `
Every attempt is written to the refresh log, including failures.
Exits with a network error code only when no source could be refreshed.
`
    )
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log progress to stderr')
    .action(async (rawOptions: Record<string, unknown>) => {
      await executeRefreshCommand(rawOptions);
    });

  program
    .command('refresh-logs')
    .description('Show recent refresh attempts')
    .option('--limit <n>', 'Number of entries', '20')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log progress to stderr')
    .action(async (rawOptions: Record<string, unknown>) => {
      await executeRefreshLogsCommand(rawOptions);
    });
}

async function executeRefreshCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const output = new OutputManager(outputFormatFor(rawOptions));

  const input = parseCommandInput(RefreshCommandInputSchema, rawOptions);
  if (input.isErr()) {
    output.error('refresh', input.error, ExitCodes.INVALID_ARGS);
    return;
  }
  applyVerboseFlag(input.value.verbose);

  try {
    await runCommand(async (ctx) => {
      const service = await ctx.service();

      const spinner = output.spinner();
      spinner?.start(`Refreshing ${service.getProviderNames().length} sources`);
      const result = await service.refreshAll();
      spinner?.stop();

      if (result.isErr()) {
        ctx.exitCode = output.report('refresh', result.error, ExitCodes.DATABASE_ERROR);
        return;
      }

      output.text(formatRefreshOutcomes(result.value));
      output.json('refresh', result.value.map(toRefreshOutcomeJson));

      if (result.value.every((outcome) => outcome.status === 'failure')) {
        ctx.exitCode = ExitCodes.NETWORK_ERROR;
      }
    });
  } catch (error) {
    output.error('refresh', toError(error), ExitCodes.GENERAL_ERROR);
  }
}

async function executeRefreshLogsCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const output = new OutputManager(outputFormatFor(rawOptions));

  const input = parseCommandInput(RefreshLogsCommandInputSchema, rawOptions);
  if (input.isErr()) {
    output.error('refresh-logs', input.error, ExitCodes.INVALID_ARGS);
    return;
  }

  const options = input.value;
  applyVerboseFlag(options.verbose);

  try {
    await runCommand(async (ctx) => {
      const service = await ctx.service();

      const result = await service.listRefreshLogs(options.limit);
      if (result.isErr()) {
        ctx.exitCode = output.report('refresh-logs', result.error, ExitCodes.DATABASE_ERROR);
        return;
      }

      output.text(formatRefreshLogsForDisplay(result.value));
      output.json('refresh-logs', result.value.map(toRefreshLogJson));
    });
  } catch (error) {
    output.error('refresh-logs', toError(error), ExitCodes.GENERAL_ERROR);
  }
}
