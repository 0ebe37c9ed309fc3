import { describe, expect, it } from 'vitest';
import { LocalRecordSigner } from '../src/keys';
import { signRecord, verifyRecord } from '../src/signing';
import {
  decodeWireRecord,
  fromWireRecord,
  parseWireRecord,
  tagValue,
  toWireRecord,
} from '../src/wireRecord';
import type { SignedRecord, WireRecord } from '../src/types';

const signer = LocalRecordSigner.fromSeedHex('33'.repeat(32));

const makeRecord = (): SignedRecord =>
  signRecord(
    {
      authorKey: signer.authorKey,
      stableId: 'field-notes',
      version: 2,
      title: 'Field notes',
      content: 'Notes gathered over a long walk by the river.',
      summary: 'Walking notes',
      topics: ['walks', 'rivers'],
      createdAt: 1_700_000_500,
      supersedes: 'd'.repeat(64),
      status: 'published',
    },
    signer
  );

describe('toWireRecord', () => {
  it('maps domain fields onto the relay shape', () => {
    const record = makeRecord();
    const wire = toWireRecord(record);
    expect(wire.id).toBe(record.recordId);
    expect(wire.pubkey).toBe(signer.authorKey);
    expect(wire.kind).toBe(30023);
    expect(wire.sig).toBe(record.signature);
    expect(tagValue(wire.tags, 'd')).toBe('field-notes');
    expect(tagValue(wire.tags, 'supersedes')).toBe('d'.repeat(64));
    expect(wire.tags.filter((tag) => tag[0] === 't')).toEqual([
      ['t', 'walks'],
      ['t', 'rivers'],
    ]);
  });
});

describe('decodeWireRecord', () => {
  it('restores a record that still verifies', () => {
    const record = makeRecord();
    const decoded = decodeWireRecord(
      JSON.parse(JSON.stringify(toWireRecord(record)))
    );
    expect(decoded).toEqual({ ok: true, value: record });
    if (decoded.ok) {
      expect(verifyRecord(decoded.value)).toEqual({ ok: true });
    }
  });

  it('rejects values that are not record-shaped', () => {
    expect(parseWireRecord(null).ok).toBe(false);
    const result = parseWireRecord({ ...toWireRecord(makeRecord()), kind: 1 });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toContain('kind');
    }
  });

  it('rejects uppercase or short hex ids', () => {
    const wire = toWireRecord(makeRecord());
    expect(parseWireRecord({ ...wire, id: wire.id.toUpperCase() }).ok).toBe(false);
    expect(parseWireRecord({ ...wire, sig: 'ab' }).ok).toBe(false);
  });
});

describe('fromWireRecord', () => {
  const wireWithTags = (tags: string[][]): WireRecord => ({
    ...toWireRecord(makeRecord()),
    tags,
  });

  it('requires a version tag', () => {
    expect(
      fromWireRecord(wireWithTags([['d', 'x'], ['title', 'X'], ['status', 'published']]))
    ).toEqual({ ok: false, error: 'missing or invalid version tag' });
  });

  it('requires supersedes above version 1', () => {
    expect(
      fromWireRecord(
        wireWithTags([
          ['d', 'x'],
          ['title', 'X'],
          ['version', '3'],
          ['status', 'published'],
        ])
      )
    ).toEqual({ ok: false, error: 'supersedes is required when version > 1' });
  });

  it('rejects supersedes on version 1', () => {
    expect(
      fromWireRecord(
        wireWithTags([
          ['d', 'x'],
          ['title', 'X'],
          ['version', '1'],
          ['status', 'published'],
          ['supersedes', 'e'.repeat(64)],
        ])
      )
    ).toEqual({ ok: false, error: 'supersedes is not allowed on version 1' });
  });

  it('rejects statuses other than published', () => {
    expect(
      fromWireRecord(
        wireWithTags([
          ['d', 'x'],
          ['title', 'X'],
          ['version', '1'],
          ['status', 'draft'],
        ])
      )
    ).toEqual({ ok: false, error: 'unsupported status draft' });
  });

  it('rejects a d tag that is not a valid stable id', () => {
    for (const stableId of ['x'.repeat(200), 'has space', '.hidden']) {
      expect(
        fromWireRecord(
          wireWithTags([
            ['d', stableId],
            ['title', 'X'],
            ['version', '1'],
            ['status', 'published'],
          ])
        )
      ).toEqual({ ok: false, error: 'invalid d tag' });
    }
  });

  it('rejects NUL characters', () => {
    const tags = [
      ['d', 'x'],
      ['title', 'X'],
      ['version', '1'],
      ['status', 'published'],
    ];
    expect(fromWireRecord({ ...wireWithTags(tags), content: 'bad\u0000body' })).toEqual({
      ok: false,
      error: 'NUL character in content or tags',
    });
    expect(fromWireRecord(wireWithTags([...tags, ['t', 'a\u0000b']]))).toEqual({
      ok: false,
      error: 'NUL character in content or tags',
    });
  });
});
