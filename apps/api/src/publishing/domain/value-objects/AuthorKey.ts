import { isHex } from '@folio/record-codec';

/**
 * Hex-encoded Ed25519 public key identifying an author.
 */
export class AuthorKey {
  private constructor(private readonly value: string) {}

  static from(value: string): AuthorKey {
    const normalized = value.trim().toLowerCase();
    if (!isHex(normalized, 32)) {
      throw new Error('AuthorKey must be 64 hex characters');
    }
    return new AuthorKey(normalized);
  }

  unwrap(): string {
    return this.value;
  }

  equals(other: AuthorKey): boolean {
    return this.value === other.value;
  }
}
