import type { SignedRecord } from '@folio/record-codec';
import {
  RecordRepository,
  RecordStorageError,
  UpsertOutcomeKinds,
  type ChainHead,
  type ListLatestQuery,
  type UpsertOutcome,
} from '../../../src/publishing/application/ports/record-repository';
import { evaluateChainAppend } from '../../../src/publishing/domain/chain-append';

const chainKey = (authorKey: string, stableId: string) =>
  `${authorKey}::${stableId}`;

/**
 * Check and insert happen without an await in between, so concurrent callers
 * see the same atomicity as the row lock in Postgres.
 */
export class InMemoryRecordRepository extends RecordRepository {
  private readonly records = new Map<string, SignedRecord>();
  private readonly heads = new Map<string, ChainHead>();
  failure: Error | null = null;
  /** Records whose writes fail as if the database refused them. */
  readonly failingIds = new Set<string>();

  async upsertRecord(record: SignedRecord): Promise<UpsertOutcome> {
    if (this.failure) {
      throw new RecordStorageError('Failed to store record', this.failure);
    }
    if (this.failingIds.has(record.recordId)) {
      throw new RecordStorageError(
        'Failed to store record',
        new Error('invalid byte sequence for encoding "UTF8": 0x00')
      );
    }
    const key = chainKey(record.authorKey, record.stableId);
    const outcome = evaluateChainAppend(
      {
        head: this.heads.get(key) ?? null,
        alreadyStored: this.records.has(record.recordId),
      },
      record
    );
    if (outcome.kind === UpsertOutcomeKinds.accepted) {
      this.records.set(record.recordId, record);
      this.heads.set(key, { recordId: record.recordId, version: record.version });
    }
    return outcome;
  }

  async latestFor(authorKey: string, stableId: string): Promise<SignedRecord | null> {
    const head = this.heads.get(chainKey(authorKey, stableId));
    return head ? (this.records.get(head.recordId) ?? null) : null;
  }

  async history(authorKey: string, stableId: string): Promise<SignedRecord[]> {
    return [...this.records.values()]
      .filter((record) => record.authorKey === authorKey && record.stableId === stableId)
      .sort((a, b) => a.version - b.version);
  }

  async historyForAuthor(authorKey: string, limit: number): Promise<SignedRecord[]> {
    return [...this.records.values()]
      .filter((record) => record.authorKey === authorKey)
      .sort(
        (a, b) =>
          b.createdAt - a.createdAt ||
          b.version - a.version ||
          a.recordId.localeCompare(b.recordId)
      )
      .slice(0, limit);
  }

  async findById(recordId: string): Promise<SignedRecord | null> {
    return this.records.get(recordId) ?? null;
  }

  async listLatest(query: ListLatestQuery): Promise<SignedRecord[]> {
    const offset = query.offset ?? 0;
    return [...this.heads.values()]
      .map((head) => this.records.get(head.recordId))
      .filter((record): record is SignedRecord => record !== undefined)
      .filter((record) => !query.authorKey || record.authorKey === query.authorKey)
      .filter(
        (record) =>
          !query.topics ||
          query.topics.length === 0 ||
          record.topics.some((topic) => query.topics?.includes(topic))
      )
      .filter((record) => query.since === undefined || record.createdAt >= query.since)
      .sort((a, b) => b.createdAt - a.createdAt || a.recordId.localeCompare(b.recordId))
      .slice(offset, offset + query.limit);
  }

  get size(): number {
    return this.records.size;
  }
}
