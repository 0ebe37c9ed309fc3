import { randomBytes } from 'node:crypto';
import { STABLE_ID_PATTERN } from '@folio/record-codec';

/**
 * Author-chosen identifier of a document across all of its versions.
 */
export class StableId {
  private constructor(private readonly value: string) {}

  static from(value: string): StableId {
    const trimmed = value.trim();
    if (!STABLE_ID_PATTERN.test(trimmed)) {
      throw new Error(
        'StableId must be 1-128 characters of letters, digits, ".", "_" or "-"'
      );
    }
    return new StableId(trimmed);
  }

  static generate(): StableId {
    return new StableId(randomBytes(4).toString('hex'));
  }

  unwrap(): string {
    return this.value;
  }
}
