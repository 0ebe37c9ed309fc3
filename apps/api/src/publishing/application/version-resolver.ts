import { Inject, Injectable } from '@nestjs/common';
import type { SignedRecord } from '@folio/record-codec';
import { RecordVersion } from '../domain/value-objects/RecordVersion';
import { RecordRepository } from './ports/record-repository';

export type NextVersion = Readonly<{
  version: number;
  supersedes: string | null;
}>;

export const ChainProblems = {
  notFirst: 'not_first',
  gap: 'gap',
  brokenLink: 'broken_link',
  mixedChain: 'mixed_chain',
} as const;

export type ChainProblem = (typeof ChainProblems)[keyof typeof ChainProblems];

export type ChainValidation =
  | Readonly<{ valid: true }>
  | Readonly<{ valid: false; problem: ChainProblem; version: number }>;

export type ChainLink = Pick<
  SignedRecord,
  'authorKey' | 'stableId' | 'recordId' | 'version' | 'supersedes'
>;

@Injectable()
export class VersionResolver {
  constructor(
    @Inject(RecordRepository) private readonly records: RecordRepository
  ) {}

  /**
   * Version and predecessor for the next record of a chain. The answer is a
   * proposal: `RecordRepository.upsertRecord` rejects it if another writer
   * extended the chain first.
   */
  async nextVersion(authorKey: string, stableId: string): Promise<NextVersion> {
    const latest = await this.records.latestFor(authorKey, stableId);
    if (!latest) {
      return { version: RecordVersion.first().unwrap(), supersedes: null };
    }
    return {
      version: RecordVersion.from(latest.version).next().unwrap(),
      supersedes: latest.recordId,
    };
  }

  /** Expects `records` in ascending version order. */
  validateChain(records: ReadonlyArray<ChainLink>): ChainValidation {
    const first = records[0];
    let previous: ChainLink | null = null;
    for (const [index, record] of records.entries()) {
      if (
        first &&
        (record.authorKey !== first.authorKey ||
          record.stableId !== first.stableId)
      ) {
        return { valid: false, problem: ChainProblems.mixedChain, version: record.version };
      }
      if (record.version !== index + 1) {
        return {
          valid: false,
          problem: previous ? ChainProblems.gap : ChainProblems.notFirst,
          version: record.version,
        };
      }
      const expectedLink = previous ? previous.recordId : null;
      if (record.supersedes !== expectedLink) {
        return { valid: false, problem: ChainProblems.brokenLink, version: record.version };
      }
      previous = record;
    }
    return { valid: true };
  }
}
