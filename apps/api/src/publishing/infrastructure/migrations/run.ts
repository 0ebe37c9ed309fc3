import path from 'path';
import { Logger } from '@nestjs/common';
import { config } from 'dotenv';
import { DEFAULT_DATABASE_URL } from '@platform/config/folio-settings';
import {
  resolveConnectionString,
  runMigrations,
} from '@platform/infrastructure/migrations/migrator';
import type { PublishingDatabase } from '../database.types';

config();

async function main(): Promise<void> {
  const connectionString = resolveConnectionString(
    'DATABASE_URL',
    DEFAULT_DATABASE_URL
  );

  await runMigrations<PublishingDatabase>({
    migrationsPath: path.join(__dirname, 'publishing'),
    connectionString,
    migrationTableName: 'publishing_migrations',
    direction: process.argv[2] === 'down' ? 'down' : 'up',
  });
}

main().catch((error: unknown) => {
  new Logger('Migrations').error(
    error instanceof Error ? error.message : String(error)
  );
  process.exit(1);
});
