#!/usr/bin/env -S node --import tsx
import { getLogger } from '@lkr-rates/logger';

import { createProgram } from './program.js';

const logger = getLogger('CLI');

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  logger.error({ error }, `Uncaught Exception: ${error.message}`);
  process.exit(1);
});

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    logger.error({ error }, 'CLI failed');
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
