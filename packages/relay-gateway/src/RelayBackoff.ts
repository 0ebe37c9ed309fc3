import type { BackoffPolicy } from './types';

export const DEFAULT_BACKOFF: BackoffPolicy = {
  initialDelayMs: 5_000,
  multiplier: 2,
  maxDelayMs: 120_000,
};

/**
 * Cooldown length after the given number of consecutive failures.
 */
export class RelayBackoff {
  readonly policy: BackoffPolicy;

  constructor(policy: Partial<BackoffPolicy> = {}) {
    const merged = { ...DEFAULT_BACKOFF, ...policy };
    if (merged.initialDelayMs < 0 || merged.maxDelayMs < merged.initialDelayMs) {
      throw new Error('Backoff delays must satisfy 0 <= initial <= max');
    }
    if (merged.multiplier < 1) {
      throw new Error('Backoff multiplier must be >= 1');
    }
    this.policy = merged;
  }

  delayFor(consecutiveFailures: number): number {
    if (consecutiveFailures <= 0) return 0;
    const { initialDelayMs, multiplier, maxDelayMs } = this.policy;
    const delay = initialDelayMs * multiplier ** (consecutiveFailures - 1);
    return Math.min(delay, maxDelayMs);
  }
}
