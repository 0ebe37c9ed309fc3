import { verify as verifyBytes } from 'node:crypto';
import { canonicalize, deriveRecordId } from './canonical';
import { decodeHex, isHex } from './hex';
import { importAuthorKey } from './keys';
import {
  VerificationFailures,
  type RecordFields,
  type RecordSigner,
  type SignedRecord,
  type VerificationResult,
} from './types';

export class RecordCodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecordCodecError';
  }
}

/** Signs the record id derived from `bytes`. */
export const sign = (bytes: Uint8Array, signer: RecordSigner): string =>
  signer.signDigest(decodeHex(deriveRecordId(bytes)));

/**
 * Checks `signature` over `recordId` for `authorKey`. Malformed input is a
 * `false`, never an exception.
 */
export const verify = (
  recordId: string,
  signature: string,
  authorKey: string
): boolean => {
  if (!isHex(recordId, 32) || !isHex(signature, 64) || !isHex(authorKey, 32)) {
    return false;
  }
  try {
    return verifyBytes(
      null,
      decodeHex(recordId),
      importAuthorKey(authorKey),
      decodeHex(signature)
    );
  } catch {
    return false;
  }
};

export const signRecord = (
  fields: RecordFields,
  signer: RecordSigner
): SignedRecord => {
  if (fields.authorKey !== signer.authorKey) {
    throw new RecordCodecError('Signer does not hold the key for this author');
  }
  const bytes = canonicalize(fields);
  return {
    ...fields,
    recordId: deriveRecordId(bytes),
    signature: sign(bytes, signer),
  };
};

export const verifyRecord = (record: SignedRecord): VerificationResult => {
  const expectedId = deriveRecordId(canonicalize(record));
  if (expectedId !== record.recordId) {
    return { ok: false, reason: VerificationFailures.idMismatch };
  }
  if (!verify(record.recordId, record.signature, record.authorKey)) {
    return { ok: false, reason: VerificationFailures.badSignature };
  }
  return { ok: true };
};
