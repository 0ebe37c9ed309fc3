import type { ColumnType } from 'kysely';

type TimestampColumn = ColumnType<
  Date,
  Date | string | undefined,
  Date | string
>;

/** Postgres returns bigint as string. */
type UnixSecondsColumn = ColumnType<string | number, number, number>;

export interface RecordsTable {
  record_id: string;
  author_key: string;
  stable_id: string;
  version: number;
  title: string;
  content: string;
  summary: string | null;
  topics: string[];
  created_at: UnixSecondsColumn;
  supersedes: string | null;
  status: string;
  signature: string;
  stored_at: TimestampColumn;
}

export interface ChainHeadsTable {
  author_key: string;
  stable_id: string;
  record_id: string | null;
  version: number;
  updated_at: TimestampColumn;
}

export interface DraftsTable {
  author_key: string;
  stable_id: string;
  title: string;
  content: string;
  summary: string | null;
  topics: string[];
  created_at: TimestampColumn;
  updated_at: TimestampColumn;
}

export interface PublishingDatabase {
  'publishing.records': RecordsTable;
  'publishing.chain_heads': ChainHeadsTable;
  'publishing.drafts': DraftsTable;
}
