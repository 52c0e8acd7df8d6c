export { createSqliteDatabase } from './database.js';
export { runMigrations } from './migrations.js';
export { closeSqliteDatabase } from './close.js';

// Re-export commonly used Kysely types so consumers don't need kysely as a direct dependency
export { Kysely, sql, type Generated, type Migration, type Selectable } from 'kysely';
