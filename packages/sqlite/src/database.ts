import * as fs from 'node:fs';
import * as path from 'node:path';

import { wrapError } from '@lkr-rates/core';
import { getLogger } from '@lkr-rates/logger';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

const logger = getLogger('SqliteDatabase');

/**
 * Create and configure a SQLite-backed Kysely database instance.
 *
 * File databases run in WAL mode; ':memory:' is accepted for tests.
 */
export function createSqliteDatabase<T>(dbPath: string): Result<Kysely<T>, Error> {
  try {
    const dataDir = path.dirname(dbPath);
    if (dbPath !== ':memory:' && !fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }

    const sqliteDb = new Database(dbPath);

    sqliteDb.pragma('foreign_keys = ON');
    sqliteDb.pragma('journal_mode = WAL');
    sqliteDb.pragma('synchronous = NORMAL');
    sqliteDb.pragma('busy_timeout = 5000');
    sqliteDb.pragma('temp_store = memory');

    logger.debug(`Connected to SQLite database: ${dbPath}`);

    return ok(
      new Kysely<T>({
        dialect: new SqliteDialect({ database: sqliteDb }),
      })
    );
  } catch (error) {
    logger.error({ error }, `Error creating SQLite database: ${dbPath}`);
    return wrapError(error, `Failed to create SQLite database: ${dbPath}`);
  }
}
