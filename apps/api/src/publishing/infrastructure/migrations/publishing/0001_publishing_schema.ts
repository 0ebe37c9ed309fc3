import { Kysely, sql } from 'kysely';
import type { PublishingDatabase } from '../../database.types';

export async function up(db: Kysely<PublishingDatabase>): Promise<void> {
  await db.schema.createSchema('publishing').ifNotExists().execute();

  await db.schema
    .createTable('publishing.records')
    .addColumn('record_id', 'varchar(64)', (col) => col.primaryKey())
    .addColumn('author_key', 'varchar(64)', (col) => col.notNull())
    .addColumn('stable_id', 'varchar(128)', (col) => col.notNull())
    .addColumn('version', 'integer', (col) => col.notNull())
    .addColumn('title', 'text', (col) => col.notNull())
    .addColumn('content', 'text', (col) => col.notNull())
    .addColumn('summary', 'text')
    .addColumn('topics', sql`text[]`, (col) =>
      col.notNull().defaultTo(sql`'{}'`)
    )
    .addColumn('created_at', 'bigint', (col) => col.notNull())
    .addColumn('supersedes', 'varchar(64)')
    .addColumn('status', 'varchar(16)', (col) => col.notNull())
    .addColumn('signature', 'varchar(128)', (col) => col.notNull())
    .addColumn('stored_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createIndex('publishing_records_chain_version_idx')
    .on('publishing.records')
    .columns(['author_key', 'stable_id', 'version'])
    .unique()
    .execute();

  await db.schema
    .createTable('publishing.chain_heads')
    .addColumn('author_key', 'varchar(64)', (col) => col.notNull())
    .addColumn('stable_id', 'varchar(128)', (col) => col.notNull())
    .addColumn('record_id', 'varchar(64)')
    .addColumn('version', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('updated_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addPrimaryKeyConstraint('publishing_chain_heads_pk', [
      'author_key',
      'stable_id',
    ])
    .execute();

  await db.schema
    .createTable('publishing.drafts')
    .addColumn('author_key', 'varchar(64)', (col) => col.notNull())
    .addColumn('stable_id', 'varchar(128)', (col) => col.notNull())
    .addColumn('title', 'text', (col) => col.notNull())
    .addColumn('content', 'text', (col) => col.notNull())
    .addColumn('summary', 'text')
    .addColumn('topics', sql`text[]`, (col) =>
      col.notNull().defaultTo(sql`'{}'`)
    )
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addColumn('updated_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addPrimaryKeyConstraint('publishing_drafts_pk', ['author_key', 'stable_id'])
    .execute();

  await db.schema
    .createIndex('publishing_drafts_author_updated_idx')
    .on('publishing.drafts')
    .columns(['author_key', 'updated_at'])
    .execute();
}

export async function down(db: Kysely<PublishingDatabase>): Promise<void> {
  await db.schema.dropTable('publishing.drafts').ifExists().execute();
  await db.schema.dropTable('publishing.chain_heads').ifExists().execute();
  await db.schema.dropTable('publishing.records').ifExists().execute();
  await db.schema.dropSchema('publishing').ifExists().execute();
}
