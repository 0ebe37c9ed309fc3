import { afterEach, describe, expect, it, vi } from 'vitest';
import { toWireRecord, type SignedRecord, type WireRecord } from '@folio/record-codec';
import type { RelayAck, RelayFilter, RelayTransportPort } from '@folio/relay-gateway';
import { loadFolioSettings } from '../../src/platform/config/folio-settings';
import { RecordIngestService } from '../../src/publishing/application/record-ingest.service';
import { RelayIndexer } from '../../src/publishing/infrastructure/relay-indexer';
import { createRelayGateway } from '../../src/relay/infrastructure/relay-gateway.provider';
import { InMemoryRecordRepository } from './support/in-memory-record-repository';
import { bob, signedChain, signedRecord } from './support/fixtures';

class StoredEventsTransport implements RelayTransportPort {
  readonly filters: RelayFilter[] = [];

  constructor(private readonly stored: ReadonlyArray<WireRecord>) {}

  async publish(): Promise<RelayAck> {
    return { accepted: true, message: '' };
  }

  async *subscribe(_url: string, filter: RelayFilter): AsyncGenerator<unknown> {
    this.filters.push(filter);
    for (const wire of this.stored) {
      yield wire;
    }
  }
}

const setup = (
  environment: Record<string, string> = {},
  extra: ReadonlyArray<SignedRecord> = []
) => {
  const chain = signedChain(['first body', 'second body']);
  const transport = new StoredEventsTransport(
    [...extra, ...[...chain].reverse()].map(toWireRecord)
  );
  const settings = loadFolioSettings({
    RELAY_URLS: 'ws://relay-a.test',
    RELAY_MIN_CONTENT_LENGTH: '5',
    RELAY_INDEXER_LIMIT: '50',
    ...environment,
  });
  const records = new InMemoryRecordRepository();
  const indexer = new RelayIndexer(
    createRelayGateway(settings, transport),
    new RecordIngestService(records),
    settings
  );
  return { chain, transport, records, indexer };
};

describe('RelayIndexer', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('stores fetched records and advances its cursor', async () => {
    const { chain, transport, records, indexer } = setup();

    const first = await indexer.runOnce();
    expect(first).toMatchObject({ received: 2, accepted: 2 });
    expect(records.size).toBe(2);

    const second = await indexer.runOnce();
    expect(second).toMatchObject({ received: 2, accepted: 0, duplicates: 2 });

    expect(transport.filters).toEqual([
      { since: undefined, limit: 50 },
      { since: chain[1]?.createdAt, limit: 50 },
    ]);
  });

  it('does not move its cursor past the current time', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-01T00:00:00Z'));
    const future = signedRecord(
      { stableId: 'from-the-future', createdAt: 4_000_000_000 },
      bob
    );
    const { transport, records, indexer } = setup({}, [future]);

    await indexer.runOnce();
    await indexer.runOnce();

    expect(await records.findById(future.recordId)).not.toBeNull();
    expect(transport.filters).toEqual([
      { since: undefined, limit: 50 },
      { since: Date.UTC(2026, 2, 1) / 1000, limit: 50 },
    ]);
  });

  it('drops unusable records and stores the rest of the pass', async () => {
    const longId = signedRecord(
      { stableId: 'x'.repeat(200), content: 'hostile body' },
      bob
    );
    const nul = signedRecord(
      { stableId: 'nul', content: 'hostile\u0000body' },
      bob
    );
    const { chain, records, indexer } = setup({}, [longId, nul]);

    const summary = await indexer.runOnce();

    expect(summary).toMatchObject({ received: 2, accepted: 2, failed: 0 });
    expect(records.size).toBe(2);
    expect(await records.findById(chain[1]?.recordId ?? '')).not.toBeNull();
    expect(await records.findById(longId.recordId)).toBeNull();
    expect(await records.findById(nul.recordId)).toBeNull();
  });

  it('shares one pass between concurrent callers', async () => {
    const { transport, indexer } = setup();

    const pass = indexer.runOnce();
    expect(indexer.runOnce()).toBe(pass);
    await pass;

    expect(transport.filters).toHaveLength(1);
  });

  it('does not start when disabled', () => {
    const { indexer } = setup({ RELAY_INDEXER_ENABLED: 'false' });
    const start = vi.spyOn(indexer, 'start');

    indexer.onApplicationBootstrap();

    expect(start).not.toHaveBeenCalled();
  });

  it('runs a pass as soon as it starts', async () => {
    const { transport, indexer } = setup();

    indexer.start();
    await vi.waitFor(() => expect(transport.filters).toHaveLength(1));
    indexer.stop();
  });
});
