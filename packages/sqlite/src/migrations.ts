import { isErrorWithMessage, wrapError } from '@lkr-rates/core';
import { getLogger } from '@lkr-rates/logger';
import { Migrator, type Kysely, type Migration } from 'kysely';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

const logger = getLogger('SqliteMigrations');

/**
 * Run all pending migrations from a programmatic migration record.
 *
 * Keys are migration names (e.g. '001_initial_schema') and run in key order.
 */
export async function runMigrations<T>(
  db: Kysely<T>,
  migrations: Record<string, Migration>
): Promise<Result<void, Error>> {
  try {
    logger.debug(`Running migrations (${Object.keys(migrations).length} registered)`);

    const migrator = new Migrator({
      db,
      provider: { getMigrations: () => Promise.resolve(migrations) },
    });

    const { error, results } = await migrator.migrateToLatest();

    if (results && results.length > 0) {
      for (const result of results) {
        if (result.status === 'Success') {
          logger.debug(`Migration "${result.migrationName}" executed successfully`);
        } else if (result.status === 'Error') {
          logger.error(`Migration "${result.migrationName}" failed`);
        }
      }
    } else {
      logger.debug('No pending migrations');
    }

    if (error) {
      logger.error({ error }, 'Migration failed');
      const errorMessage = isErrorWithMessage(error) ? error.message : 'Unknown migration error';
      return err(new Error(errorMessage));
    }

    return ok();
  } catch (error) {
    logger.error({ error }, 'Error running migrations');
    return wrapError(error, 'Failed to run migrations');
  }
}
