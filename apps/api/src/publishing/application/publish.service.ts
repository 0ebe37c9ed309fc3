import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  RecordStatuses,
  normalizeTopics,
  signRecord,
  type RecordSigner,
  type SignedRecord,
} from '@folio/record-codec';
import type { ChainHead } from '../domain/chain-append';
import { AuthorKey } from '../domain/value-objects/AuthorKey';
import { StableId } from '../domain/value-objects/StableId';
import { DraftRepository } from './ports/draft-repository';
import {
  RecordPropagator,
  type PropagationReport,
} from './ports/record-propagator';
import {
  RecordRepository,
  UpsertOutcomeKinds,
} from './ports/record-repository';
import { VersionResolver } from './version-resolver';

export const PublishStages = {
  authorizing: 'Authorizing',
  resolvingVersion: 'ResolvingVersion',
  signing: 'Signing',
  persisting: 'Persisting',
  propagating: 'Propagating',
  done: 'Done',
  rejected: 'Rejected',
} as const;

export type PublishStage = (typeof PublishStages)[keyof typeof PublishStages];

export const PublishRejectionReasons = {
  forbidden: 'forbidden',
  invalid: 'invalid',
  conflict: 'conflict',
  notFound: 'not_found',
} as const;

export type PublishRejectionReason =
  (typeof PublishRejectionReasons)[keyof typeof PublishRejectionReasons];

export type PublishCommand = Readonly<{
  signer: RecordSigner;
  authorKey: string;
  /** Generated when absent. */
  stableId?: string | null;
  title: string;
  content: string;
  summary?: string | null;
  topics?: ReadonlyArray<string>;
}>;

export type RevertCommand = Readonly<{
  signer: RecordSigner;
  authorKey: string;
  recordId: string;
}>;

export type PublishOutcome =
  | Readonly<{
      status: 'published';
      record: SignedRecord;
      relays: PropagationReport;
      stages: ReadonlyArray<PublishStage>;
    }>
  | Readonly<{
      status: 'rejected';
      reason: PublishRejectionReason;
      message: string;
      head: ChainHead | null;
      stages: ReadonlyArray<PublishStage>;
    }>;

type ValidatedCommand = Readonly<{
  authorKey: string;
  stableId: string;
  title: string;
  content: string;
  summary: string | null;
  topics: string[];
}>;

const nowSeconds = (): number => Math.floor(Date.now() / 1000);

/**
 * Runs one author action from authorization to relay propagation. A record is
 * published once it is committed locally; relay results are informational.
 */
@Injectable()
export class PublishService {
  private readonly logger = new Logger(PublishService.name);

  constructor(
    @Inject(RecordRepository) private readonly records: RecordRepository,
    @Inject(DraftRepository) private readonly drafts: DraftRepository,
    @Inject(VersionResolver) private readonly versions: VersionResolver,
    @Inject(RecordPropagator) private readonly propagator: RecordPropagator
  ) {}

  async publish(command: PublishCommand): Promise<PublishOutcome> {
    const stages: PublishStage[] = [PublishStages.authorizing];
    const reject = (
      reason: PublishRejectionReason,
      message: string,
      head: ChainHead | null = null
    ): PublishOutcome => {
      stages.push(PublishStages.rejected);
      return { status: 'rejected', reason, message, head, stages };
    };

    if (command.signer.authorKey !== command.authorKey) {
      return reject(
        PublishRejectionReasons.forbidden,
        'Signer does not belong to this author'
      );
    }
    const validated = this.validate(command);
    if (typeof validated === 'string') {
      return reject(PublishRejectionReasons.invalid, validated);
    }

    stages.push(PublishStages.resolvingVersion);
    const { version, supersedes } = await this.versions.nextVersion(
      validated.authorKey,
      validated.stableId
    );

    stages.push(PublishStages.signing);
    const record = signRecord(
      {
        authorKey: validated.authorKey,
        stableId: validated.stableId,
        version,
        title: validated.title,
        content: validated.content,
        summary: validated.summary,
        topics: validated.topics,
        createdAt: nowSeconds(),
        supersedes,
        status: RecordStatuses.published,
      },
      command.signer
    );

    stages.push(PublishStages.persisting);
    const outcome = await this.records.upsertRecord(record);
    if (outcome.kind === UpsertOutcomeKinds.rejected) {
      return reject(
        PublishRejectionReasons.conflict,
        `Version ${version} of ${validated.stableId} was ${outcome.reason}; re-resolve and retry`,
        outcome.head
      );
    }
    if (outcome.kind === UpsertOutcomeKinds.duplicateIgnored) {
      return reject(
        PublishRejectionReasons.conflict,
        `Record ${record.recordId} is already published`
      );
    }
    this.logger.log(
      `Published ${validated.stableId} v${version} as ${record.recordId}`
    );

    await this.discardDraft(validated.authorKey, validated.stableId);

    stages.push(PublishStages.propagating);
    const relays = await this.propagate(record);

    stages.push(PublishStages.done);
    return { status: 'published', record, relays, stages };
  }

  /**
   * Publishes the content of an earlier version as the next version of its
   * chain. History is never rewritten.
   */
  async revert(command: RevertCommand): Promise<PublishOutcome> {
    const source = await this.records.findById(command.recordId);
    if (!source) {
      return {
        status: 'rejected',
        reason: PublishRejectionReasons.notFound,
        message: `Record ${command.recordId} not found`,
        head: null,
        stages: [PublishStages.authorizing, PublishStages.rejected],
      };
    }
    if (source.authorKey !== command.authorKey) {
      return {
        status: 'rejected',
        reason: PublishRejectionReasons.forbidden,
        message: 'Record belongs to another author',
        head: null,
        stages: [PublishStages.authorizing, PublishStages.rejected],
      };
    }
    return this.publish({
      signer: command.signer,
      authorKey: command.authorKey,
      stableId: source.stableId,
      title: source.title,
      content: source.content,
      summary: source.summary,
      topics: source.topics,
    });
  }

  private validate(command: PublishCommand): ValidatedCommand | string {
    let authorKey: string;
    let stableId: string;
    try {
      authorKey = AuthorKey.from(command.authorKey).unwrap();
      stableId = command.stableId
        ? StableId.from(command.stableId).unwrap()
        : StableId.generate().unwrap();
    } catch (error) {
      return error instanceof Error ? error.message : String(error);
    }
    const title = command.title.trim();
    if (!title) return 'Title is required';
    if (!command.content.trim()) return 'Content is required';
    const summary = command.summary?.trim() || null;
    return {
      authorKey,
      stableId,
      title,
      content: command.content,
      summary,
      topics: normalizeTopics(command.topics ?? []),
    };
  }

  private async discardDraft(authorKey: string, stableId: string): Promise<void> {
    try {
      await this.drafts.delete(authorKey, stableId);
    } catch (error) {
      this.logger.warn(
        `Published ${stableId} but could not delete its draft: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  private async propagate(record: SignedRecord): Promise<PropagationReport> {
    try {
      return await this.propagator.propagate(record);
    } catch (error) {
      this.logger.warn(
        `Propagation of ${record.recordId} failed: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
      return {};
    }
  }
}
