import {
  createPrivateKey,
  createPublicKey,
  generateKeyPairSync,
  sign as signBytes,
  type KeyObject,
} from 'node:crypto';
import { encodeHex, isHex } from './hex';
import type { RecordSigner } from './types';

// DER headers for raw 32-byte Ed25519 keys.
const PKCS8_PREFIX = Buffer.from('302e020100300506032b657004220420', 'hex');
const SPKI_PREFIX = Buffer.from('302a300506032b6570032100', 'hex');

export class SigningKeyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SigningKeyError';
  }
}

const exportAuthorKey = (privateKey: KeyObject): string => {
  const der = createPublicKey(privateKey).export({
    format: 'der',
    type: 'spki',
  });
  return encodeHex(der.subarray(SPKI_PREFIX.length));
};

export const importAuthorKey = (authorKey: string): KeyObject => {
  if (!isHex(authorKey, 32)) {
    throw new SigningKeyError('Author key must be 32-byte hex');
  }
  return createPublicKey({
    key: Buffer.concat([SPKI_PREFIX, Buffer.from(authorKey, 'hex')]),
    format: 'der',
    type: 'spki',
  });
};

/**
 * Holds an author's Ed25519 key in memory. The private key has no accessor
 * and is excluded from JSON output.
 */
export class LocalRecordSigner implements RecordSigner {
  private constructor(
    private readonly privateKey: KeyObject,
    readonly authorKey: string
  ) {}

  static fromSeedHex(seedHex: string): LocalRecordSigner {
    const normalized = seedHex.trim().toLowerCase();
    if (!isHex(normalized, 32)) {
      throw new SigningKeyError('Signing key must be 32-byte hex');
    }
    const privateKey = createPrivateKey({
      key: Buffer.concat([PKCS8_PREFIX, Buffer.from(normalized, 'hex')]),
      format: 'der',
      type: 'pkcs8',
    });
    return new LocalRecordSigner(privateKey, exportAuthorKey(privateKey));
  }

  static generate(): LocalRecordSigner {
    const { privateKey } = generateKeyPairSync('ed25519');
    return new LocalRecordSigner(privateKey, exportAuthorKey(privateKey));
  }

  signDigest(digest: Uint8Array): string {
    return encodeHex(signBytes(null, digest, this.privateKey));
  }

  toJSON(): { authorKey: string } {
    return { authorKey: this.authorKey };
  }
}
