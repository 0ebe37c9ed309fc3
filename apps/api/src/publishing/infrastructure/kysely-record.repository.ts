import { Inject, Injectable, Logger } from '@nestjs/common';
import { sql, type Kysely, type Selectable } from 'kysely';
import { RecordStatuses, type SignedRecord } from '@folio/record-codec';
import {
  ChainRejectionReasons,
  RecordRepository,
  RecordStorageError,
  UpsertOutcomeKinds,
  type ChainHead,
  type ListLatestQuery,
  type UpsertOutcome,
} from '../application/ports/record-repository';
import { evaluateChainAppend } from '../domain/chain-append';
import { PublishingDatabaseService } from './database.service';
import type { PublishingDatabase, RecordsTable } from './database.types';

const isUniqueViolation = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  error.code === '23505';

const toRecord = (row: Selectable<RecordsTable>): SignedRecord => ({
  recordId: row.record_id,
  authorKey: row.author_key,
  stableId: row.stable_id,
  version: row.version,
  title: row.title,
  content: row.content,
  summary: row.summary,
  topics: row.topics,
  createdAt: Number(row.created_at),
  supersedes: row.supersedes,
  status: RecordStatuses.published,
  signature: row.signature,
});

@Injectable()
export class KyselyRecordRepository extends RecordRepository {
  private readonly logger = new Logger(KyselyRecordRepository.name);

  constructor(
    @Inject(PublishingDatabaseService)
    private readonly dbService: PublishingDatabaseService
  ) {
    super();
  }

  /**
   * Locks the chain head row for the duration of the transaction. The unique
   * (author_key, stable_id, version) index backs the lock up; a violation is a
   * fork.
   */
  async upsertRecord(record: SignedRecord): Promise<UpsertOutcome> {
    const db = this.dbService.getDb();
    try {
      return await db.transaction().execute(async (trx) => {
        await trx
          .insertInto('publishing.chain_heads')
          .values({
            author_key: record.authorKey,
            stable_id: record.stableId,
            record_id: null,
            version: 0,
          })
          .onConflict((oc) => oc.columns(['author_key', 'stable_id']).doNothing())
          .execute();

        const headRow = await trx
          .selectFrom('publishing.chain_heads')
          .select(['record_id', 'version'])
          .where('author_key', '=', record.authorKey)
          .where('stable_id', '=', record.stableId)
          .forUpdate()
          .executeTakeFirst();

        const stored = await trx
          .selectFrom('publishing.records')
          .select('record_id')
          .where('record_id', '=', record.recordId)
          .executeTakeFirst();

        const head: ChainHead | null =
          headRow && headRow.record_id !== null
            ? { recordId: headRow.record_id, version: headRow.version }
            : null;
        const decision = evaluateChainAppend(
          { head, alreadyStored: stored !== undefined },
          record
        );
        if (decision.kind !== UpsertOutcomeKinds.accepted) {
          return decision;
        }

        await trx
          .insertInto('publishing.records')
          .values({
            record_id: record.recordId,
            author_key: record.authorKey,
            stable_id: record.stableId,
            version: record.version,
            title: record.title,
            content: record.content,
            summary: record.summary,
            topics: [...record.topics],
            created_at: record.createdAt,
            supersedes: record.supersedes,
            status: record.status,
            signature: record.signature,
          })
          .execute();

        await trx
          .updateTable('publishing.chain_heads')
          .set({
            record_id: record.recordId,
            version: record.version,
            updated_at: new Date(),
          })
          .where('author_key', '=', record.authorKey)
          .where('stable_id', '=', record.stableId)
          .execute();

        return decision;
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        this.logger.warn(
          `Concurrent write on ${record.stableId} v${record.version}; rejecting ${record.recordId}`
        );
        return {
          kind: UpsertOutcomeKinds.rejected,
          reason: ChainRejectionReasons.fork,
          head: await this.currentHead(record.authorKey, record.stableId),
        };
      }
      throw new RecordStorageError(
        `Failed to store record ${record.recordId}`,
        error
      );
    }
  }

  async latestFor(
    authorKey: string,
    stableId: string
  ): Promise<SignedRecord | null> {
    const row = await this.query('load latest record', (db) =>
      db
        .selectFrom('publishing.records')
        .selectAll()
        .where('author_key', '=', authorKey)
        .where('stable_id', '=', stableId)
        .orderBy('version', 'desc')
        .limit(1)
        .executeTakeFirst()
    );
    return row ? toRecord(row) : null;
  }

  async history(authorKey: string, stableId: string): Promise<SignedRecord[]> {
    const rows = await this.query('load history', (db) =>
      db
        .selectFrom('publishing.records')
        .selectAll()
        .where('author_key', '=', authorKey)
        .where('stable_id', '=', stableId)
        .orderBy('version', 'asc')
        .execute()
    );
    return rows.map(toRecord);
  }

  async historyForAuthor(authorKey: string, limit: number): Promise<SignedRecord[]> {
    const rows = await this.query('load author history', (db) =>
      db
        .selectFrom('publishing.records')
        .selectAll()
        .where('author_key', '=', authorKey)
        .orderBy('created_at', 'desc')
        .orderBy('version', 'desc')
        .orderBy('record_id', 'asc')
        .limit(limit)
        .execute()
    );
    return rows.map(toRecord);
  }

  async findById(recordId: string): Promise<SignedRecord | null> {
    const row = await this.query('load record', (db) =>
      db
        .selectFrom('publishing.records')
        .selectAll()
        .where('record_id', '=', recordId)
        .executeTakeFirst()
    );
    return row ? toRecord(row) : null;
  }

  async listLatest(query: ListLatestQuery): Promise<SignedRecord[]> {
    const rows = await this.query('list latest records', (db) => {
      let select = db
        .selectFrom('publishing.chain_heads as h')
        .innerJoin('publishing.records as r', 'r.record_id', 'h.record_id')
        .selectAll('r');
      if (query.authorKey) {
        select = select.where('r.author_key', '=', query.authorKey);
      }
      if (query.topics && query.topics.length > 0) {
        select = select.where(
          sql<boolean>`r.topics && ${sql.val([...query.topics])}::text[]`
        );
      }
      if (query.since !== undefined) {
        select = select.where('r.created_at', '>=', query.since);
      }
      return select
        .orderBy('r.created_at', 'desc')
        .orderBy('r.record_id', 'asc')
        .limit(query.limit)
        .offset(query.offset ?? 0)
        .execute();
    });
    return rows.map(toRecord);
  }

  private async currentHead(
    authorKey: string,
    stableId: string
  ): Promise<ChainHead | null> {
    const latest = await this.latestFor(authorKey, stableId);
    return latest ? { recordId: latest.recordId, version: latest.version } : null;
  }

  private async query<T>(
    action: string,
    run: (db: Kysely<PublishingDatabase>) => Promise<T>
  ): Promise<T> {
    try {
      return await run(this.dbService.getDb());
    } catch (error) {
      throw new RecordStorageError(`Failed to ${action}`, error);
    }
  }
}
