/** Event kind used for long-form records on the relay network. */
export const RECORD_KIND = 30023;

export const RecordStatuses = {
  published: 'published',
} as const;

/** Letters and digits first, then up to 127 of letters, digits, ".", "_" or "-". */
export const STABLE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

export type RecordStatus = (typeof RecordStatuses)[keyof typeof RecordStatuses];

/**
 * The logical fields of a record. Everything the signature covers lives here;
 * `recordId` and `signature` are derived from these fields.
 */
export type RecordFields = Readonly<{
  authorKey: string;
  stableId: string;
  version: number;
  title: string;
  content: string;
  summary: string | null;
  topics: ReadonlyArray<string>;
  createdAt: number;
  supersedes: string | null;
  status: RecordStatus;
}>;

export type SignedRecord = RecordFields &
  Readonly<{
    recordId: string;
    signature: string;
  }>;

export type WireTag = ReadonlyArray<string>;

/**
 * Relay wire shape. Field names follow the relay protocol, not our domain.
 */
export type WireRecord = Readonly<{
  id: string;
  pubkey: string;
  created_at: number;
  kind: number;
  tags: ReadonlyArray<WireTag>;
  content: string;
  sig: string;
}>;

export const VerificationFailures = {
  idMismatch: 'id_mismatch',
  badSignature: 'bad_signature',
} as const;

export type VerificationFailure =
  (typeof VerificationFailures)[keyof typeof VerificationFailures];

export type VerificationResult =
  | Readonly<{ ok: true }>
  | Readonly<{ ok: false; reason: VerificationFailure }>;

export type DecodeResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; error: string }>;

export interface RecordSigner {
  readonly authorKey: string;
  /** Signs a 32-byte record id digest and returns the hex signature. */
  signDigest(digest: Uint8Array): string;
}
