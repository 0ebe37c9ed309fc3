import { RelayBackoff } from './RelayBackoff';
import type { RelaySnapshot } from './types';

type RelayState = {
  url: string;
  failures: number;
  cooldownUntil: number | null;
  lastSuccessAt: number | null;
  lastFailureAt: number | null;
  lastError: string | null;
};

export const normalizeRelayUrl = (url: string): string => {
  const trimmed = url.trim();
  const parsed = new URL(trimmed);
  if (parsed.protocol !== 'ws:' && parsed.protocol !== 'wss:') {
    throw new Error(`Relay URL must use ws:// or wss:// (${trimmed})`);
  }
  const serialized = parsed.toString();
  return parsed.pathname === '/' && !parsed.search
    ? serialized.slice(0, -1)
    : serialized;
};

/**
 * Health state per relay. One instance per gateway; nothing outside the
 * gateway mutates it.
 */
export class RelayRegistry {
  private readonly relays = new Map<string, RelayState>();

  constructor(
    urls: Iterable<string>,
    private readonly backoff: RelayBackoff
  ) {
    for (const url of urls) {
      this.add(url);
    }
  }

  add(url: string): string {
    const normalized = normalizeRelayUrl(url);
    if (!this.relays.has(normalized)) {
      this.relays.set(normalized, {
        url: normalized,
        failures: 0,
        cooldownUntil: null,
        lastSuccessAt: null,
        lastFailureAt: null,
        lastError: null,
      });
    }
    return normalized;
  }

  remove(url: string): boolean {
    return this.relays.delete(normalizeRelayUrl(url));
  }

  has(url: string): boolean {
    return this.relays.has(url);
  }

  urls(): string[] {
    return [...this.relays.keys()];
  }

  cooldownUntil(url: string, now: number): number | null {
    const state = this.relays.get(url);
    if (!state || state.cooldownUntil === null) return null;
    return state.cooldownUntil > now ? state.cooldownUntil : null;
  }

  recordSuccess(url: string, now: number): void {
    const state = this.relays.get(url);
    if (!state) return;
    state.failures = 0;
    state.cooldownUntil = null;
    state.lastSuccessAt = now;
    state.lastError = null;
  }

  /** Returns the cooldown end applied by this failure. */
  recordFailure(url: string, now: number, reason: string): number | null {
    const state = this.relays.get(url);
    if (!state) return null;
    state.failures += 1;
    state.lastFailureAt = now;
    state.lastError = reason;
    state.cooldownUntil = now + this.backoff.delayFor(state.failures);
    return state.cooldownUntil;
  }

  snapshot(): RelaySnapshot[] {
    return [...this.relays.values()].map((state) => ({ ...state }));
  }
}
