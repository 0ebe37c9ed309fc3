import { Inject, Injectable } from '@nestjs/common';
import { normalizeTopics } from '@folio/record-codec';
import type { Draft } from '../domain/Draft';
import { AuthorKey } from '../domain/value-objects/AuthorKey';
import { StableId } from '../domain/value-objects/StableId';
import { DraftRepository } from './ports/draft-repository';

export class DraftValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DraftValidationError';
  }
}

export type SaveDraftInput = Readonly<{
  stableId?: string | null;
  title: string;
  content: string;
  summary?: string | null;
  topics?: ReadonlyArray<string>;
}>;

const validated = <T>(parse: () => T): T => {
  try {
    return parse();
  } catch (error) {
    throw new DraftValidationError(
      error instanceof Error ? error.message : String(error)
    );
  }
};

const parseIdentity = (
  authorKey: string,
  stableId: string
): { authorKey: string; stableId: string } =>
  validated(() => ({
    authorKey: AuthorKey.from(authorKey).unwrap(),
    stableId: StableId.from(stableId).unwrap(),
  }));

/**
 * Draft CRUD. Every operation is scoped to the calling author; another
 * author's draft is indistinguishable from a missing one.
 */
@Injectable()
export class DraftService {
  constructor(
    @Inject(DraftRepository) private readonly drafts: DraftRepository
  ) {}

  async saveDraft(authorKey: string, input: SaveDraftInput): Promise<Draft> {
    const identity = parseIdentity(
      authorKey,
      input.stableId || StableId.generate().unwrap()
    );
    const existing = await this.drafts.find(identity.authorKey, identity.stableId);
    const now = new Date();
    const draft: Draft = {
      ...identity,
      title: input.title.trim(),
      content: input.content,
      summary: input.summary?.trim() || null,
      topics: normalizeTopics(input.topics ?? []),
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };
    await this.drafts.save(draft);
    return draft;
  }

  async getDraft(authorKey: string, stableId: string): Promise<Draft | null> {
    const identity = parseIdentity(authorKey, stableId);
    return this.drafts.find(identity.authorKey, identity.stableId);
  }

  async listDrafts(authorKey: string): Promise<Draft[]> {
    const owner = validated(() => AuthorKey.from(authorKey).unwrap());
    return this.drafts.listForAuthor(owner);
  }

  async deleteDraft(authorKey: string, stableId: string): Promise<boolean> {
    const identity = parseIdentity(authorKey, stableId);
    return this.drafts.delete(identity.authorKey, identity.stableId);
  }
}
