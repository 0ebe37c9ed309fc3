import { Logger } from '@nestjs/common';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { LocalRecordSigner } from '@folio/record-codec';
import { createInstanceSigner } from '../../src/publishing/infrastructure/instance-signer.provider';

const SEED = '5a'.repeat(32);

describe('createInstanceSigner', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns null and warns when no key is configured', () => {
    const warn = vi.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

    expect(createInstanceSigner(null)).toBeNull();
    expect(warn).toHaveBeenCalledWith(
      'FOLIO_SIGNING_KEY is not set; local publishing is disabled'
    );
  });

  it('logs the public key and never the seed', () => {
    const log = vi.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);

    const signer = createInstanceSigner(SEED);

    const expected = LocalRecordSigner.fromSeedHex(SEED).authorKey;
    expect(signer?.authorKey).toBe(expected);
    expect(log).toHaveBeenCalledWith(`Instance author ${expected}`);
    expect(log.mock.calls.flat().join(' ')).not.toContain(SEED);
  });
});
