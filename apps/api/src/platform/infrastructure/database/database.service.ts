import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { Kysely, PostgresDialect } from 'kysely';
import { Pool } from 'pg';
import {
  FOLIO_SETTINGS,
  type FolioSettings,
} from '@platform/config/folio-settings';

@Injectable()
export class DatabaseService<DB = unknown> implements OnModuleDestroy {
  private readonly db: Kysely<DB>;

  constructor(@Inject(FOLIO_SETTINGS) settings: FolioSettings) {
    const dialect = new PostgresDialect({
      pool: new Pool({ connectionString: settings.databaseUrl }),
    });

    this.db = new Kysely<DB>({ dialect });
  }

  getDb(): Kysely<DB> {
    return this.db;
  }

  async onModuleDestroy(): Promise<void> {
    await this.db.destroy();
  }
}
