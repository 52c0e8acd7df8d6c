// Command registration for cache-range

import type { Command } from 'commander';

import { applyVerboseFlag, runCommand, toError } from '../shared/command-runtime.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager, outputFormatFor } from '../shared/output.js';
import { CacheRangeCommandInputSchema, parseCommandInput } from '../shared/schemas.js';

import { formatCacheRangeSummary } from './cache-range-utils.js';

export function registerCacheRangeCommand(program: Command): void {
  program
    .command('cache-range')
    .description('Populate stored rates for a date range')
    .argument('<start>', 'First date (YYYY-MM-DD)')
    .argument('<end>', 'Last date (YYYY-MM-DD), clamped to today')
    .addHelpText(
      'after',
      `
Examples:
  $ lkr-rates cache-range 2025-01-01 2025-03-31
  $ lkr-rates cache-range 2025-11-01 2025-11-30 --provider sampath

Dates already stored are skipped; the rest are resolved one by one.
`
    )
    .option('--provider <name>', 'Rate source: cbsl, hnb, pb or sampath', 'cbsl')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log progress to stderr')
    .action(async (start: string, end: string, rawOptions: Record<string, unknown>) => {
      await executeCacheRangeCommand({ ...rawOptions, end, start });
    });
}

async function executeCacheRangeCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const output = new OutputManager(outputFormatFor(rawOptions));

  const input = parseCommandInput(CacheRangeCommandInputSchema, rawOptions);
  if (input.isErr()) {
    output.error('cache-range', input.error, ExitCodes.INVALID_ARGS);
    return;
  }

  const options = input.value;
  applyVerboseFlag(options.verbose);

  try {
    await runCommand(async (ctx) => {
      const service = await ctx.service();

      const spinner = output.spinner();
      spinner?.start(`Caching ${options.provider} rates from ${options.start} to ${options.end}`);
      const result = await service.cacheRange(options.start, options.end, options.provider);
      spinner?.stop();

      if (result.isErr()) {
        ctx.exitCode = output.report('cache-range', result.error, ExitCodes.GENERAL_ERROR);
        return;
      }

      output.note(formatCacheRangeSummary(result.value), 'Cache range');
      output.json('cache-range', result.value);
    });
  } catch (error) {
    output.error('cache-range', toError(error), ExitCodes.GENERAL_ERROR);
  }
}
