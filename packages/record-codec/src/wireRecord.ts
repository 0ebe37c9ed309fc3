import { z } from 'zod';
import { buildTags } from './canonical';
import {
  RECORD_KIND,
  RecordStatuses,
  STABLE_ID_PATTERN,
  type DecodeResult,
  type SignedRecord,
  type WireRecord,
} from './types';

const hexOfLength = (bytes: number) =>
  z.string().regex(new RegExp(`^[0-9a-f]{${bytes * 2}}$`), {
    message: `expected ${bytes}-byte lowercase hex`,
  });

const wireRecordSchema = z.object({
  id: hexOfLength(32),
  pubkey: hexOfLength(32),
  created_at: z.number().int().nonnegative(),
  kind: z.literal(RECORD_KIND),
  tags: z.array(z.array(z.string())),
  content: z.string(),
  sig: hexOfLength(64),
});

const VERSION_PATTERN = /^[1-9][0-9]*$/;

const hasNul = (wire: WireRecord): boolean =>
  wire.content.includes('\u0000') ||
  wire.tags.some((tag) => tag.some((value) => value.includes('\u0000')));

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');

/** First value of the named tag, if any. */
export const tagValue = (
  tags: WireRecord['tags'],
  name: string
): string | undefined => tags.find((tag) => tag[0] === name)?.[1];

export const toWireRecord = (record: SignedRecord): WireRecord => ({
  id: record.recordId,
  pubkey: record.authorKey,
  created_at: record.createdAt,
  kind: RECORD_KIND,
  tags: buildTags(record),
  content: record.content,
  sig: record.signature,
});

/** Structural check only; no tag semantics and no cryptography. */
export const parseWireRecord = (value: unknown): DecodeResult<WireRecord> => {
  const parsed = wireRecordSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, error: formatIssues(parsed.error) };
  }
  return { ok: true, value: parsed.data };
};

/**
 * Maps a wire record onto domain fields. `supersedes` must be present exactly
 * when `version > 1`; the `d` tag must be a valid stable id.
 */
export const fromWireRecord = (
  wire: WireRecord
): DecodeResult<SignedRecord> => {
  const stableId = tagValue(wire.tags, 'd');
  const title = tagValue(wire.tags, 'title');
  const versionText = tagValue(wire.tags, 'version');
  const status = tagValue(wire.tags, 'status');
  const summary = tagValue(wire.tags, 'summary');
  const supersedes = tagValue(wire.tags, 'supersedes');

  if (!stableId) return { ok: false, error: 'missing d tag' };
  if (!STABLE_ID_PATTERN.test(stableId)) {
    return { ok: false, error: 'invalid d tag' };
  }
  if (!title) return { ok: false, error: 'missing title tag' };
  if (!versionText || !VERSION_PATTERN.test(versionText)) {
    return { ok: false, error: 'missing or invalid version tag' };
  }
  if (status !== RecordStatuses.published) {
    return { ok: false, error: `unsupported status ${String(status)}` };
  }
  if (hasNul(wire)) {
    return { ok: false, error: 'NUL character in content or tags' };
  }
  const version = Number(versionText);
  if (version > 1 && !supersedes) {
    return { ok: false, error: 'supersedes is required when version > 1' };
  }
  if (version === 1 && supersedes) {
    return { ok: false, error: 'supersedes is not allowed on version 1' };
  }

  return {
    ok: true,
    value: {
      authorKey: wire.pubkey,
      stableId,
      version,
      title,
      content: wire.content,
      summary: summary ?? null,
      topics: wire.tags
        .filter((tag) => tag[0] === 't' && typeof tag[1] === 'string')
        .map((tag) => tag[1] ?? ''),
      createdAt: wire.created_at,
      supersedes: supersedes ?? null,
      status: RecordStatuses.published,
      recordId: wire.id,
      signature: wire.sig,
    },
  };
};

export const decodeWireRecord = (value: unknown): DecodeResult<SignedRecord> => {
  const parsed = parseWireRecord(value);
  if (!parsed.ok) return parsed;
  return fromWireRecord(parsed.value);
};
