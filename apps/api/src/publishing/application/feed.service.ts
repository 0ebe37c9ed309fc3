import { Inject, Injectable } from '@nestjs/common';
import { normalizeTopics, type SignedRecord } from '@folio/record-codec';
import { AuthorKey } from '../domain/value-objects/AuthorKey';
import { StableId } from '../domain/value-objects/StableId';
import { RecordRepository } from './ports/record-repository';

export const DEFAULT_FEED_LIMIT = 15;
export const MAX_FEED_LIMIT = 100;
const SECONDS_PER_DAY = 86_400;

export class FeedQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FeedQueryError';
  }
}

export type FeedQuery = Readonly<{
  author?: string;
  /** Comma or whitespace separated; a record matching any token is kept. */
  tag?: string;
  sinceDays?: number;
  limit?: number;
  offset?: number;
}>;

const parseTags = (tag: string | undefined): string[] =>
  tag ? normalizeTopics(tag.split(/[\s,]+/)) : [];

const clampLimit = (limit: number | undefined): number =>
  Math.min(MAX_FEED_LIMIT, Math.max(1, Math.floor(limit ?? DEFAULT_FEED_LIMIT)));

@Injectable()
export class FeedService {
  constructor(
    @Inject(RecordRepository) private readonly records: RecordRepository
  ) {}

  /** Latest version of each chain, newest first. Never returns superseded versions. */
  async listLatest(query: FeedQuery = {}): Promise<SignedRecord[]> {
    const topics = parseTags(query.tag);
    const sinceDays = query.sinceDays ?? 0;
    return this.records.listLatest({
      authorKey: query.author ? this.parseAuthor(query.author) : undefined,
      topics: topics.length > 0 ? topics : undefined,
      since:
        sinceDays > 0
          ? Math.floor(Date.now() / 1000) - Math.floor(sinceDays * SECONDS_PER_DAY)
          : undefined,
      limit: clampLimit(query.limit),
      offset: Math.max(0, Math.floor(query.offset ?? 0)),
    });
  }

  async history(authorKey: string, stableId: string): Promise<SignedRecord[]> {
    const author = this.parseAuthor(authorKey);
    let chain: string;
    try {
      chain = StableId.from(stableId).unwrap();
    } catch (error) {
      throw new FeedQueryError(error instanceof Error ? error.message : String(error));
    }
    return this.records.history(author, chain);
  }

  /** Versions of every chain by `authorKey`, newest first, superseded ones included. */
  async authorHistory(authorKey: string, limit?: number): Promise<SignedRecord[]> {
    return this.records.historyForAuthor(this.parseAuthor(authorKey), clampLimit(limit));
  }

  async findRecord(recordId: string): Promise<SignedRecord | null> {
    return this.records.findById(recordId.trim().toLowerCase());
  }

  private parseAuthor(authorKey: string): string {
    try {
      return AuthorKey.from(authorKey).unwrap();
    } catch (error) {
      throw new FeedQueryError(error instanceof Error ? error.message : String(error));
    }
  }
}
