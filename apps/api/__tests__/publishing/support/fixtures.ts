import {
  LocalRecordSigner,
  RecordStatuses,
  signRecord,
  type RecordFields,
  type SignedRecord,
} from '@folio/record-codec';

export const alice = LocalRecordSigner.fromSeedHex('33'.repeat(32));
export const bob = LocalRecordSigner.fromSeedHex('44'.repeat(32));

export const signedRecord = (
  overrides: Partial<RecordFields> = {},
  signer: LocalRecordSigner = alice
): SignedRecord =>
  signRecord(
    {
      authorKey: signer.authorKey,
      stableId: 'intro',
      version: 1,
      title: 'Intro',
      content: 'Hello',
      summary: null,
      topics: [],
      createdAt: 1_700_000_000,
      supersedes: null,
      status: RecordStatuses.published,
      ...overrides,
    },
    signer
  );

/** Builds versions 1..n of a chain, each linked to the previous one. */
export const signedChain = (
  contents: ReadonlyArray<string>,
  overrides: Partial<RecordFields> = {},
  signer: LocalRecordSigner = alice
): SignedRecord[] => {
  const chain: SignedRecord[] = [];
  contents.forEach((content, index) => {
    const previous = chain[index - 1];
    chain.push(
      signedRecord(
        {
          ...overrides,
          content,
          version: index + 1,
          supersedes: previous ? previous.recordId : null,
          createdAt: 1_700_000_000 + index * 60,
        },
        signer
      )
    );
  });
  return chain;
};
