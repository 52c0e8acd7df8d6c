import { Command } from 'commander';

import { registerBanksCommand } from './features/banks/banks.js';
import { registerCacheRangeCommand } from './features/cache-range/cache-range.js';
import { registerHistoryCommand } from './features/history/history.js';
import { registerImportCsvCommand } from './features/import-csv/import-csv.js';
import { registerMonthCommand } from './features/month/month.js';
import { registerRateCommand } from './features/rate/rate.js';
import { registerRefreshCommand } from './features/refresh/refresh.js';

export function createProgram(): Command {
  const program = new Command();
  program
    .name('lkr-rates')
    .description('USD/LKR exchange rates from the central bank and commercial banks')
    .version('0.1.0');

  registerRateCommand(program);
  registerMonthCommand(program);
  registerBanksCommand(program);
  registerHistoryCommand(program);
  registerRefreshCommand(program);
  registerCacheRangeCommand(program);
  registerImportCsvCommand(program);

  return program;
}
