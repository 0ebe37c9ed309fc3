import { describe, expect, it } from 'vitest';
import { decodeHex, encodeHex, isHex } from '../src/hex';

describe('hex', () => {
  it('encodes bytes as lowercase hex', () => {
    expect(encodeHex(new Uint8Array([0, 15, 255]))).toBe('000fff');
  });

  it('decodes lowercase hex', () => {
    expect(Array.from(decodeHex('000fff'))).toEqual([0, 15, 255]);
  });

  it('throws on odd length or uppercase input', () => {
    expect(() => decodeHex('abc')).toThrow('Value is not lowercase hex');
    expect(() => decodeHex('ABCD')).toThrow('Value is not lowercase hex');
  });

  it('checks byte length when requested', () => {
    expect(isHex('ab'.repeat(32), 32)).toBe(true);
    expect(isHex('ab'.repeat(31), 32)).toBe(false);
    expect(isHex(42)).toBe(false);
  });
});
