import type { SignedRecord } from '@folio/record-codec';

export const UpsertOutcomeKinds = {
  accepted: 'accepted',
  duplicateIgnored: 'duplicate_ignored',
  rejected: 'rejected',
} as const;

export const ChainRejectionReasons = {
  stale: 'stale',
  fork: 'fork',
} as const;

export type ChainRejectionReason =
  (typeof ChainRejectionReasons)[keyof typeof ChainRejectionReasons];

export type ChainHead = Readonly<{
  recordId: string;
  version: number;
}>;

export type UpsertOutcome =
  | Readonly<{ kind: typeof UpsertOutcomeKinds.accepted }>
  | Readonly<{ kind: typeof UpsertOutcomeKinds.duplicateIgnored }>
  | Readonly<{
      kind: typeof UpsertOutcomeKinds.rejected;
      reason: ChainRejectionReason;
      head: ChainHead | null;
    }>;

export type ChainAppendCandidate = Pick<
  SignedRecord,
  'recordId' | 'version' | 'supersedes'
>;

/**
 * Decides whether `candidate` may become the new head of its chain.
 * Checks run in order: already stored, stale, fork.
 */
export const evaluateChainAppend = (
  state: Readonly<{ head: ChainHead | null; alreadyStored: boolean }>,
  candidate: ChainAppendCandidate
): UpsertOutcome => {
  const { head, alreadyStored } = state;
  if (alreadyStored) {
    return { kind: UpsertOutcomeKinds.duplicateIgnored };
  }
  if (!head) {
    return candidate.version === 1 && candidate.supersedes === null
      ? { kind: UpsertOutcomeKinds.accepted }
      : { kind: UpsertOutcomeKinds.rejected, reason: ChainRejectionReasons.fork, head };
  }
  if (candidate.version <= head.version) {
    return {
      kind: UpsertOutcomeKinds.rejected,
      reason: ChainRejectionReasons.stale,
      head,
    };
  }
  if (
    candidate.version !== head.version + 1 ||
    candidate.supersedes !== head.recordId
  ) {
    return {
      kind: UpsertOutcomeKinds.rejected,
      reason: ChainRejectionReasons.fork,
      head,
    };
  }
  return { kind: UpsertOutcomeKinds.accepted };
};
