import { sql, type Kysely, type Migration } from '@lkr-rates/sqlite';

export const initialSchema: Migration = {
  async up(db: Kysely<unknown>): Promise<void> {
    await db.schema
      .createTable('exchange_rates')
      .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
      .addColumn('date', 'text', (col) => col.notNull())
      .addColumn('buy_rate', 'text', (col) => col.notNull())
      .addColumn('sell_rate', 'text', (col) => col.notNull())
      .addColumn('source', 'text', (col) => col.notNull())
      .addColumn('created_at', 'text', (col) => col.notNull().defaultTo(sql`(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`))
      .addColumn('updated_at', 'text', (col) => col.notNull().defaultTo(sql`(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`))
      .addUniqueConstraint('exchange_rates_date_source_unique', ['date', 'source'])
      .execute();

    await db.schema
      .createIndex('idx_exchange_rates_source_date')
      .on('exchange_rates')
      .columns(['source', 'date'])
      .execute();

    await db.schema
      .createTable('exchange_rate_refresh_logs')
      .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
      .addColumn('source', 'text', (col) => col.notNull())
      .addColumn('status', 'text', (col) => col.notNull().check(sql`status in ('success', 'failure')`))
      .addColumn('buy_rate', 'text')
      .addColumn('sell_rate', 'text')
      .addColumn('error_message', 'text')
      .addColumn('duration_ms', 'integer', (col) => col.notNull())
      .addColumn('created_at', 'text', (col) => col.notNull())
      .execute();

    await db.schema
      .createIndex('idx_refresh_logs_created_at')
      .on('exchange_rate_refresh_logs')
      .column('created_at')
      .execute();
  },

  async down(db: Kysely<unknown>): Promise<void> {
    await db.schema.dropTable('exchange_rate_refresh_logs').ifExists().execute();
    await db.schema.dropTable('exchange_rates').ifExists().execute();
  },
};
