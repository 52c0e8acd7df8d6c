import { wrapError } from '@lkr-rates/core';
import { getLogger } from '@lkr-rates/logger';
import type { Kysely } from 'kysely';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

const logger = getLogger('SqliteDatabase');

export async function closeSqliteDatabase<T>(db: Kysely<T>): Promise<Result<void, Error>> {
  try {
    await db.destroy();
    logger.debug('Database connection closed');
    return ok();
  } catch (error) {
    logger.error({ error }, 'Error closing database');
    return wrapError(error, 'Failed to close database');
  }
}
