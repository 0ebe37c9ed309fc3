import type { Draft } from '../../domain/Draft';

export abstract class DraftRepository {
  abstract save(draft: Draft): Promise<void>;

  abstract find(authorKey: string, stableId: string): Promise<Draft | null>;

  /** Newest `updatedAt` first. */
  abstract listForAuthor(authorKey: string): Promise<Draft[]>;

  abstract delete(authorKey: string, stableId: string): Promise<boolean>;
}
