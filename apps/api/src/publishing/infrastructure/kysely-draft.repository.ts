import { Inject, Injectable } from '@nestjs/common';
import type { Selectable } from 'kysely';
import { DraftRepository } from '../application/ports/draft-repository';
import { RecordStorageError } from '../application/ports/record-repository';
import type { Draft } from '../domain/Draft';
import { PublishingDatabaseService } from './database.service';
import type { DraftsTable } from './database.types';

const toDraft = (row: Selectable<DraftsTable>): Draft => ({
  authorKey: row.author_key,
  stableId: row.stable_id,
  title: row.title,
  content: row.content,
  summary: row.summary,
  topics: row.topics,
  createdAt: new Date(row.created_at),
  updatedAt: new Date(row.updated_at),
});

@Injectable()
export class KyselyDraftRepository extends DraftRepository {
  constructor(
    @Inject(PublishingDatabaseService)
    private readonly dbService: PublishingDatabaseService
  ) {
    super();
  }

  async save(draft: Draft): Promise<void> {
    const values = {
      title: draft.title,
      content: draft.content,
      summary: draft.summary,
      topics: [...draft.topics],
      updated_at: draft.updatedAt,
    };
    await this.run('save draft', () =>
      this.dbService
        .getDb()
        .insertInto('publishing.drafts')
        .values({
          author_key: draft.authorKey,
          stable_id: draft.stableId,
          created_at: draft.createdAt,
          ...values,
        })
        .onConflict((oc) =>
          oc.columns(['author_key', 'stable_id']).doUpdateSet(values)
        )
        .execute()
    );
  }

  async find(authorKey: string, stableId: string): Promise<Draft | null> {
    const row = await this.run('load draft', () =>
      this.dbService
        .getDb()
        .selectFrom('publishing.drafts')
        .selectAll()
        .where('author_key', '=', authorKey)
        .where('stable_id', '=', stableId)
        .executeTakeFirst()
    );
    return row ? toDraft(row) : null;
  }

  async listForAuthor(authorKey: string): Promise<Draft[]> {
    const rows = await this.run('list drafts', () =>
      this.dbService
        .getDb()
        .selectFrom('publishing.drafts')
        .selectAll()
        .where('author_key', '=', authorKey)
        .orderBy('updated_at', 'desc')
        .execute()
    );
    return rows.map(toDraft);
  }

  async delete(authorKey: string, stableId: string): Promise<boolean> {
    const result = await this.run('delete draft', () =>
      this.dbService
        .getDb()
        .deleteFrom('publishing.drafts')
        .where('author_key', '=', authorKey)
        .where('stable_id', '=', stableId)
        .executeTakeFirst()
    );
    return Number(result.numDeletedRows) > 0;
  }

  private async run<T>(action: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      throw new RecordStorageError(`Failed to ${action}`, error);
    }
  }
}
