import { createHash } from 'node:crypto';
import { RECORD_KIND, type RecordFields } from './types';

const encoder = new TextEncoder();

/**
 * Trims, lower-cases and de-duplicates topics, keeping first occurrence order.
 */
export const normalizeTopics = (topics: Iterable<string>): string[] => {
  const normalized: string[] = [];
  for (const topic of topics) {
    const value = topic.trim().toLowerCase();
    if (value.length > 0 && !normalized.includes(value)) {
      normalized.push(value);
    }
  }
  return normalized;
};

/**
 * Builds the tag list in its fixed order. The order is part of the signed
 * bytes, so it must never depend on how `fields` was assembled.
 */
export const buildTags = (fields: RecordFields): string[][] => {
  const tags: string[][] = [
    ['d', fields.stableId],
    ['title', fields.title],
    ['published_at', String(fields.createdAt)],
    ['version', String(fields.version)],
    ['status', fields.status],
  ];
  if (fields.summary) {
    tags.push(['summary', fields.summary]);
  }
  if (fields.supersedes) {
    tags.push(['supersedes', fields.supersedes]);
  }
  for (const topic of fields.topics) {
    tags.push(['t', topic]);
  }
  return tags;
};

export const canonicalJson = (fields: RecordFields): string =>
  JSON.stringify([
    0,
    fields.authorKey,
    fields.createdAt,
    RECORD_KIND,
    buildTags(fields),
    fields.content,
  ]);

export const canonicalize = (fields: RecordFields): Uint8Array =>
  encoder.encode(canonicalJson(fields));

export const deriveRecordId = (bytes: Uint8Array): string =>
  createHash('sha256').update(bytes).digest('hex');
