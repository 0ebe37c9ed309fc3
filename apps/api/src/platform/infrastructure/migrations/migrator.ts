import { promises as fs } from 'fs';
import path from 'path';
import { Logger } from '@nestjs/common';
import {
  FileMigrationProvider,
  Kysely,
  Migrator,
  PostgresDialect,
  type MigrationResultSet,
} from 'kysely';
import { Pool } from 'pg';

type MigratorConfig = {
  migrationsPath: string;
  connectionString: string;
  migrationTableName?: string;
  direction?: 'up' | 'down';
};

const logger = new Logger('Migrator');

export class MigrationFailedError extends Error {
  constructor(
    readonly migrationName: string | null,
    override readonly cause?: unknown
  ) {
    super(
      migrationName ? `Migration ${migrationName} failed` : 'Migration failed'
    );
    this.name = 'MigrationFailedError';
  }
}

export async function runMigrations<DB>({
  migrationsPath,
  connectionString,
  migrationTableName,
  direction = 'up',
}: MigratorConfig): Promise<void> {
  const db = new Kysely<DB>({
    dialect: new PostgresDialect({
      pool: new Pool({ connectionString }),
    }),
  });

  const provider = new FileMigrationProvider({
    fs,
    path,
    migrationFolder: migrationsPath,
  });

  const migrator = new Migrator({
    db,
    provider,
    migrationTableName,
  });

  try {
    const migrationResult: MigrationResultSet =
      direction === 'down'
        ? await migrator.migrateDown()
        : await migrator.migrateToLatest();

    let failed: string | null = null;
    for (const result of migrationResult.results ?? []) {
      if (result.status === 'Success') {
        logger.log(`Migration ${result.migrationName} ${direction} succeeded`);
      } else if (result.status === 'Error') {
        failed = result.migrationName;
      }
    }

    if (migrationResult.error) {
      throw new MigrationFailedError(failed, migrationResult.error);
    }
  } finally {
    await db.destroy();
  }
}

export function resolveConnectionString(
  envVar: string,
  fallback?: string
): string {
  const value = process.env[envVar] ?? fallback;
  if (!value) {
    throw new Error(`Missing connection string for migrations (${envVar})`);
  }
  return value;
}
