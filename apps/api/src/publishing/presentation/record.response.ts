import type { SignedRecord } from '@folio/record-codec';

export type RecordResponse = Readonly<{
  recordId: string;
  authorKey: string;
  stableId: string;
  version: number;
  title: string;
  summary: string | null;
  content: string;
  topics: ReadonlyArray<string>;
  createdAt: number;
  publishedAt: string;
  supersedes: string | null;
  signature: string;
}>;

export const toRecordResponse = (record: SignedRecord): RecordResponse => ({
  recordId: record.recordId,
  authorKey: record.authorKey,
  stableId: record.stableId,
  version: record.version,
  title: record.title,
  summary: record.summary,
  content: record.content,
  topics: record.topics,
  createdAt: record.createdAt,
  publishedAt: new Date(record.createdAt * 1000).toISOString(),
  supersedes: record.supersedes,
  signature: record.signature,
});
