import type { SignedRecord } from '@folio/record-codec';
import type { UpsertOutcome } from '../../domain/chain-append';

export type { ChainHead, UpsertOutcome } from '../../domain/chain-append';
export { UpsertOutcomeKinds, ChainRejectionReasons } from '../../domain/chain-append';

/** Storage I/O failed; the action may be re-run as a whole. */
export class RecordStorageError extends Error {
  constructor(
    message: string,
    override readonly cause?: unknown
  ) {
    super(message);
    this.name = 'RecordStorageError';
  }
}

export type ListLatestQuery = Readonly<{
  authorKey?: string;
  /** Matches records carrying any of these topics. */
  topics?: ReadonlyArray<string>;
  /** Unix seconds; only records created at or after this instant. */
  since?: number;
  limit: number;
  offset?: number;
}>;

export abstract class RecordRepository {
  /**
   * Appends `record` to its chain if it extends the current head. The check
   * and the insert are one atomic step.
   */
  abstract upsertRecord(record: SignedRecord): Promise<UpsertOutcome>;

  abstract latestFor(
    authorKey: string,
    stableId: string
  ): Promise<SignedRecord | null>;

  abstract history(authorKey: string, stableId: string): Promise<SignedRecord[]>;

  /** Every stored version by one author across chains, newest `createdAt` first. */
  abstract historyForAuthor(authorKey: string, limit: number): Promise<SignedRecord[]>;

  abstract findById(recordId: string): Promise<SignedRecord | null>;

  /** One record per chain, newest `createdAt` first. */
  abstract listLatest(query: ListLatestQuery): Promise<SignedRecord[]>;
}
