import { Inject, Injectable, Logger } from '@nestjs/common';
import type { SignedRecord } from '@folio/record-codec';
import {
  ChainRejectionReasons,
  RecordRepository,
  RecordStorageError,
  UpsertOutcomeKinds,
  type UpsertOutcome,
} from './ports/record-repository';

export type IngestSummary = Readonly<{
  received: number;
  accepted: number;
  duplicates: number;
  stale: number;
  forks: number;
  /** Records the store refused to write; they are skipped, not retried. */
  failed: number;
  /** Highest `createdAt` among received records, or null when none arrived. */
  newestCreatedAt: number | null;
}>;

type Tally = {
  accepted: number;
  duplicates: number;
  stale: number;
  forks: number;
  failed: number;
};

/**
 * Stores verified records that arrived from relays. Records that do not yet
 * extend their chain are retried once, in version order, after the stream
 * ends, so a later version seen before its predecessor is still kept.
 */
@Injectable()
export class RecordIngestService {
  private readonly logger = new Logger(RecordIngestService.name);

  constructor(
    @Inject(RecordRepository) private readonly records: RecordRepository
  ) {}

  async ingest(source: AsyncIterable<SignedRecord>): Promise<IngestSummary> {
    const tally: Tally = { accepted: 0, duplicates: 0, stale: 0, forks: 0, failed: 0 };
    const deferred: SignedRecord[] = [];
    let received = 0;
    let newestCreatedAt: number | null = null;

    for await (const record of source) {
      received += 1;
      newestCreatedAt = Math.max(newestCreatedAt ?? record.createdAt, record.createdAt);
      const outcome = await this.store(record);
      if (!outcome) {
        tally.failed += 1;
      } else if (isFork(outcome)) {
        deferred.push(record);
      } else {
        count(tally, outcome);
      }
    }

    deferred.sort((a, b) => a.version - b.version);
    for (const record of deferred) {
      const outcome = await this.store(record);
      if (!outcome) {
        tally.failed += 1;
        continue;
      }
      if (outcome.kind === UpsertOutcomeKinds.rejected && isFork(outcome)) {
        this.logger.debug(
          `Ignored ${record.recordId}: v${record.version} does not extend ${record.stableId} at v${outcome.head?.version ?? 0}`
        );
      }
      count(tally, outcome);
    }

    return { received, ...tally, newestCreatedAt };
  }

  /** `null` when the store refused the record. */
  private async store(record: SignedRecord): Promise<UpsertOutcome | null> {
    try {
      return await this.records.upsertRecord(record);
    } catch (error) {
      if (!(error instanceof RecordStorageError)) throw error;
      this.logger.warn(
        `Could not store ${record.recordId} from ${record.authorKey}: ${
          error.cause instanceof Error ? error.cause.message : error.message
        }`
      );
      return null;
    }
  }
}

const isFork = (outcome: UpsertOutcome): boolean =>
  outcome.kind === UpsertOutcomeKinds.rejected &&
  outcome.reason === ChainRejectionReasons.fork;

const count = (tally: Tally, outcome: UpsertOutcome): void => {
  switch (outcome.kind) {
    case UpsertOutcomeKinds.accepted:
      tally.accepted += 1;
      break;
    case UpsertOutcomeKinds.duplicateIgnored:
      tally.duplicates += 1;
      break;
    case UpsertOutcomeKinds.rejected:
      if (outcome.reason === ChainRejectionReasons.stale) {
        tally.stale += 1;
      } else {
        tally.forks += 1;
      }
      break;
  }
};
