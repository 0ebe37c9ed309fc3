import { parseWireRecord, tagValue, type WireRecord } from '@folio/record-codec';
import { DiscardReasons, type DiscardReason } from './types';

export const DEFAULT_MIN_CONTENT_LENGTH = 30;

export type ScreeningResult =
  | Readonly<{ accepted: true; record: WireRecord }>
  | Readonly<{ accepted: false; reason: DiscardReason }>;

/**
 * Cheap checks run on every inbound candidate before any hashing or
 * signature work.
 */
export const screenCandidate = (
  candidate: unknown,
  minContentLength: number = DEFAULT_MIN_CONTENT_LENGTH
): ScreeningResult => {
  const parsed = parseWireRecord(candidate);
  if (!parsed.ok) {
    return { accepted: false, reason: DiscardReasons.malformed };
  }
  const record = parsed.value;
  if (!tagValue(record.tags, 'd') || !tagValue(record.tags, 'title')) {
    return { accepted: false, reason: DiscardReasons.missingIdentity };
  }
  if (record.content.length < minContentLength) {
    return { accepted: false, reason: DiscardReasons.contentTooShort };
  }
  return { accepted: true, record };
};
