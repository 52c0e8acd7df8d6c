import type { Migration } from '@lkr-rates/sqlite';

import { initialSchema } from './001_initial_schema.js';

export const migrations: Record<string, Migration> = {
  '001_initial_schema': initialSchema,
};
