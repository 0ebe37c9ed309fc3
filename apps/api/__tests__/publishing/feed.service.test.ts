import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  DEFAULT_FEED_LIMIT,
  FeedQueryError,
  FeedService,
  MAX_FEED_LIMIT,
} from '../../src/publishing/application/feed.service';
import { InMemoryRecordRepository } from './support/in-memory-record-repository';
import { alice, bob, signedChain, signedRecord } from './support/fixtures';

describe('FeedService', () => {
  let records: InMemoryRecordRepository;
  let service: FeedService;

  beforeEach(() => {
    records = new InMemoryRecordRepository();
    service = new FeedService(records);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('lists only the latest version of each chain, newest first', async () => {
    const [first, second] = signedChain(['Hello', 'Hello, world']);
    const other = signedRecord({ stableId: 'notes', createdAt: 1_700_000_030 }, bob);
    for (const record of [first, second, other]) {
      if (record) await records.upsertRecord(record);
    }

    const feed = await service.listLatest();

    expect(feed.map((record) => [record.stableId, record.version])).toEqual([
      ['intro', 2],
      ['notes', 1],
    ]);
  });

  it('matches any token of a comma or whitespace separated tag list', async () => {
    const rust = signedRecord({ stableId: 'rust', topics: ['rust'] });
    const go = signedRecord({ stableId: 'go', topics: ['go'] });
    const misc = signedRecord({ stableId: 'misc', topics: ['misc'] });
    for (const record of [rust, go, misc]) await records.upsertRecord(record);
    const listLatest = vi.spyOn(records, 'listLatest');

    const feed = await service.listLatest({ tag: 'Rust, GO  rust' });

    expect(feed.map((record) => record.stableId).sort()).toEqual(['go', 'rust']);
    expect(listLatest).toHaveBeenCalledWith({
      authorKey: undefined,
      topics: ['rust', 'go'],
      since: undefined,
      limit: DEFAULT_FEED_LIMIT,
      offset: 0,
    });
  });

  it('clamps the limit and turns sinceDays into a cutoff', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T00:00:00.000Z'));
    const listLatest = vi.spyOn(records, 'listLatest');

    await service.listLatest({ limit: 500, sinceDays: 2 });
    await service.listLatest({ limit: 0, offset: -4 });

    expect(listLatest).toHaveBeenNthCalledWith(1, {
      authorKey: undefined,
      topics: undefined,
      since: Date.UTC(2026, 2, 1) / 1000 - 2 * 86_400,
      limit: MAX_FEED_LIMIT,
      offset: 0,
    });
    expect(listLatest).toHaveBeenNthCalledWith(2, {
      authorKey: undefined,
      topics: undefined,
      since: undefined,
      limit: 1,
      offset: 0,
    });
  });

  it('filters by author', async () => {
    await records.upsertRecord(signedRecord());
    await records.upsertRecord(signedRecord({ stableId: 'notes' }, bob));

    const feed = await service.listLatest({ author: bob.authorKey.toUpperCase() });

    expect(feed.map((record) => record.authorKey)).toEqual([bob.authorKey]);
  });

  it('rejects a malformed author or stable id', async () => {
    await expect(service.listLatest({ author: 'nobody' })).rejects.toBeInstanceOf(
      FeedQueryError
    );
    await expect(service.history(alice.authorKey, 'bad id')).rejects.toBeInstanceOf(
      FeedQueryError
    );
  });

  it('returns a chain in version order and finds records by id', async () => {
    const chain = signedChain(['a', 'b', 'c']);
    for (const record of [...chain].reverse()) await records.upsertRecord(record);
    for (const record of chain) await records.upsertRecord(record);

    const history = await service.history(alice.authorKey, 'intro');
    expect(history.map((record) => record.version)).toEqual([1, 2, 3]);

    const [first] = chain;
    if (!first) throw new Error('chain not built');
    expect(await service.findRecord(` ${first.recordId.toUpperCase()} `)).toEqual(first);
    expect(await service.findRecord('ab'.repeat(32))).toBeNull();
  });

  it('lists every version by an author, newest first', async () => {
    const chain = signedChain(['a', 'b', 'c']);
    const notes = signedRecord({ stableId: 'notes', createdAt: 1_700_000_030 });
    const foreign = signedRecord({ stableId: 'notes', createdAt: 1_700_000_090 }, bob);
    for (const record of [...chain, notes, foreign]) await records.upsertRecord(record);

    const all = await service.authorHistory(alice.authorKey);
    expect(all.map((record) => [record.stableId, record.version])).toEqual([
      ['intro', 3],
      ['intro', 2],
      ['notes', 1],
      ['intro', 1],
    ]);

    const limited = await service.authorHistory(alice.authorKey, 2);
    expect(limited.map((record) => record.version)).toEqual([3, 2]);

    await expect(service.authorHistory('xyz')).rejects.toBeInstanceOf(FeedQueryError);
  });
});
