import { DraftRepository } from '../../../src/publishing/application/ports/draft-repository';
import type { Draft } from '../../../src/publishing/domain/Draft';

export class InMemoryDraftRepository extends DraftRepository {
  private readonly drafts = new Map<string, Draft>();

  async save(draft: Draft): Promise<void> {
    this.drafts.set(`${draft.authorKey}::${draft.stableId}`, draft);
  }

  async find(authorKey: string, stableId: string): Promise<Draft | null> {
    return this.drafts.get(`${authorKey}::${stableId}`) ?? null;
  }

  async listForAuthor(authorKey: string): Promise<Draft[]> {
    return [...this.drafts.values()]
      .filter((draft) => draft.authorKey === authorKey)
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime());
  }

  async delete(authorKey: string, stableId: string): Promise<boolean> {
    return this.drafts.delete(`${authorKey}::${stableId}`);
  }
}
