export * from './types';
export { decodeHex, encodeHex, isHex } from './hex';
export {
  buildTags,
  canonicalJson,
  canonicalize,
  deriveRecordId,
  normalizeTopics,
} from './canonical';
export {
  LocalRecordSigner,
  SigningKeyError,
  importAuthorKey,
} from './keys';
export {
  RecordCodecError,
  sign,
  signRecord,
  verify,
  verifyRecord,
} from './signing';
export {
  decodeWireRecord,
  fromWireRecord,
  parseWireRecord,
  tagValue,
  toWireRecord,
} from './wireRecord';
