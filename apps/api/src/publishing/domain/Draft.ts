/**
 * Unsigned, author-private staging content. Keyed by author and stable id.
 */
export type Draft = Readonly<{
  authorKey: string;
  stableId: string;
  title: string;
  content: string;
  summary: string | null;
  topics: ReadonlyArray<string>;
  createdAt: Date;
  updatedAt: Date;
}>;
