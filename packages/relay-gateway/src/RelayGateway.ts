import {
  fromWireRecord,
  toWireRecord,
  verifyRecord,
  type SignedRecord,
  type WireRecord,
} from '@folio/record-codec';
import { DEFAULT_MIN_CONTENT_LENGTH, screenCandidate } from './acceptance';
import { AsyncQueue } from './asyncQueue';
import { createLimiter, runWithTimeout, type Limiter } from './concurrency';
import { RelayRejectedError, describeError } from './errors';
import { RelayBackoff } from './RelayBackoff';
import { RelayRegistry } from './RelayRegistry';
import {
  DiscardReasons,
  RelayOutcomeKinds,
  type DiscardReason,
  type FetchStats,
  type GatewayLogger,
  type PublishReport,
  type RelayFilter,
  type RelayGatewayOptions,
  type RelayOutcome,
  type RelaySnapshot,
  type RelayTransportPort,
} from './types';

export const DEFAULT_TIMEOUT_MS = 5_000;
export const DEFAULT_MAX_CONCURRENCY = 5;
export const DEFAULT_RETRY_INTERVAL_MS = 15_000;
export const DEFAULT_MAX_PENDING_DELIVERIES = 500;

type PendingDelivery = {
  url: string;
  record: WireRecord;
  attempts: number;
  queuedAt: number;
};

const silentLogger: GatewayLogger = {
  log: () => undefined,
  warn: () => undefined,
};

const pendingKey = (url: string, recordId: string): string =>
  `${url} ${recordId}`;

const emptyDiscards = (): Record<DiscardReason, number> => ({
  [DiscardReasons.malformed]: 0,
  [DiscardReasons.missingIdentity]: 0,
  [DiscardReasons.contentTooShort]: 0,
  [DiscardReasons.duplicate]: 0,
  [DiscardReasons.invalidFields]: 0,
  [DiscardReasons.verificationFailed]: 0,
});

/**
 * Publishes signed records to a set of relays and reads them back.
 *
 * Relay health (consecutive failures and cooldown) is tracked per instance.
 * Deliveries that fail or are skipped during cooldown are kept as pending and
 * replayed by `retryPending`, either on demand or from the loop started with
 * `start()`.
 */
export class RelayGateway {
  private readonly transport: RelayTransportPort;
  private readonly registry: RelayRegistry;
  /** Fan-out and fan-in each hold their own `maxConcurrency` slots. */
  private readonly deliveryLimit: Limiter;
  private readonly fetchLimit: Limiter;
  private readonly timeoutMs: number;
  private readonly minContentLength: number;
  private readonly retryIntervalMs: number;
  private readonly maxPendingDeliveries: number;
  private readonly logger: GatewayLogger;
  private readonly now: () => number;
  private readonly verify: (record: SignedRecord) => boolean;
  private readonly onFetchComplete: ((stats: FetchStats) => void) | undefined;
  private readonly pending = new Map<string, PendingDelivery>();
  private retrying: Promise<PublishReport[]> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: RelayGatewayOptions) {
    this.transport = options.transport;
    this.registry = new RelayRegistry(
      options.relays,
      new RelayBackoff(options.backoff)
    );
    const maxConcurrency = options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
    this.deliveryLimit = createLimiter(maxConcurrency);
    this.fetchLimit = createLimiter(maxConcurrency);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.minContentLength =
      options.minContentLength ?? DEFAULT_MIN_CONTENT_LENGTH;
    this.retryIntervalMs = options.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS;
    this.maxPendingDeliveries =
      options.maxPendingDeliveries ?? DEFAULT_MAX_PENDING_DELIVERIES;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.verify = options.verify ?? ((record) => verifyRecord(record).ok);
    this.onFetchComplete = options.onFetchComplete;
  }

  async publish(record: SignedRecord): Promise<PublishReport> {
    const wire = toWireRecord(record);
    const urls = this.registry.urls();
    const outcomes = await Promise.all(
      urls.map(async (url) => [url, await this.deliver(url, wire)] as const)
    );
    return { recordId: wire.id, outcomes: Object.fromEntries(outcomes) };
  }

  /**
   * Replays pending deliveries whose relay is out of cooldown. Concurrent
   * calls share one pass.
   */
  retryPending(): Promise<PublishReport[]> {
    if (!this.retrying) {
      this.retrying = this.runRetryPass().finally(() => {
        this.retrying = null;
      });
    }
    return this.retrying;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.retryPending().catch((error: unknown) => {
        this.logger.warn(`Relay retry pass failed: ${describeError(error)}`);
      });
    }, this.retryIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  get pendingDeliveries(): number {
    return this.pending.size;
  }

  /**
   * Streams verified records matching `filter` from every relay that is not
   * cooling down. Each call opens fresh subscriptions; breaking out of the
   * loop cancels the ones still running.
   */
  async *fetch(filter: RelayFilter = {}): AsyncGenerator<SignedRecord, void, undefined> {
    const startedAt = this.now();
    const relays = this.registry
      .urls()
      .filter((url) => this.registry.cooldownUntil(url, startedAt) === null);
    const candidates = new AsyncQueue<unknown>();
    const cancelled = new AbortController();
    const finished = Promise.allSettled(
      relays.map((url) =>
        this.fetchLimit(() => this.drainRelay(url, filter, candidates, cancelled.signal))
      )
    ).then(() => candidates.end());

    const seen = new Set<string>();
    const discarded = emptyDiscards();
    let received = 0;
    let yielded = 0;

    try {
      for await (const candidate of candidates) {
        received += 1;
        const screened = screenCandidate(candidate, this.minContentLength);
        if (!screened.accepted) {
          discarded[screened.reason] += 1;
          continue;
        }
        if (seen.has(screened.record.id)) {
          discarded[DiscardReasons.duplicate] += 1;
          continue;
        }
        const decoded = fromWireRecord(screened.record);
        if (!decoded.ok) {
          discarded[DiscardReasons.invalidFields] += 1;
          continue;
        }
        if (!this.verify(decoded.value)) {
          discarded[DiscardReasons.verificationFailed] += 1;
          this.logger.debug?.(
            `Discarded record ${screened.record.id}: verification failed`
          );
          continue;
        }
        seen.add(decoded.value.recordId);
        yielded += 1;
        yield decoded.value;
      }
    } finally {
      cancelled.abort();
      candidates.end();
      await finished;
      this.onFetchComplete?.({ relays, received, yielded, discarded });
    }
  }

  addRelay(url: string): string {
    return this.registry.add(url);
  }

  removeRelay(url: string): boolean {
    const removed = this.registry.remove(url);
    for (const [key, delivery] of this.pending) {
      if (!this.registry.has(delivery.url)) {
        this.pending.delete(key);
      }
    }
    return removed;
  }

  listRelays(): RelaySnapshot[] {
    return this.registry.snapshot();
  }

  private async deliver(url: string, record: WireRecord): Promise<RelayOutcome> {
    const retryAt = this.registry.cooldownUntil(url, this.now());
    if (retryAt !== null) {
      this.enqueue(url, record);
      return { kind: RelayOutcomeKinds.skipped, retryAt };
    }
    return this.deliveryLimit(async () => {
      const startedAt = this.now();
      try {
        const ack = await runWithTimeout(url, this.timeoutMs, (signal) =>
          this.transport.publish(url, record, signal)
        );
        this.registry.recordSuccess(url, this.now());
        this.pending.delete(pendingKey(url, record.id));
        if (!ack.accepted) {
          const rejection = new RelayRejectedError(url, ack.message);
          this.logger.warn(rejection.message);
          return { kind: RelayOutcomeKinds.failed, reason: rejection.message };
        }
        return {
          kind: RelayOutcomeKinds.sent,
          latencyMs: this.now() - startedAt,
        };
      } catch (error) {
        const reason = describeError(error);
        const cooldownUntil = this.registry.recordFailure(url, this.now(), reason);
        this.logger.warn(
          `Delivery of ${record.id} to ${url} failed: ${reason}` +
            (cooldownUntil === null
              ? ''
              : ` (cooling down until ${new Date(cooldownUntil).toISOString()})`)
        );
        this.enqueue(url, record);
        return { kind: RelayOutcomeKinds.failed, reason };
      }
    });
  }

  private async runRetryPass(): Promise<PublishReport[]> {
    const now = this.now();
    const due = [...this.pending.values()].filter(
      (delivery) =>
        this.registry.has(delivery.url) &&
        this.registry.cooldownUntil(delivery.url, now) === null
    );
    if (due.length === 0) return [];

    const byRecord = new Map<string, PendingDelivery[]>();
    for (const delivery of due) {
      const group = byRecord.get(delivery.record.id) ?? [];
      group.push(delivery);
      byRecord.set(delivery.record.id, group);
    }

    return Promise.all(
      [...byRecord.entries()].map(async ([recordId, deliveries]) => {
        const outcomes = await Promise.all(
          deliveries.map(
            async (delivery) =>
              [delivery.url, await this.deliver(delivery.url, delivery.record)] as const
          )
        );
        return { recordId, outcomes: Object.fromEntries(outcomes) };
      })
    );
  }

  private async drainRelay(
    url: string,
    filter: RelayFilter,
    sink: AsyncQueue<unknown>,
    cancelled: AbortSignal
  ): Promise<void> {
    if (cancelled.aborted) return;
    try {
      await runWithTimeout(url, this.timeoutMs, async (timeout) => {
        const linked = new AbortController();
        const abort = () => linked.abort();
        timeout.addEventListener('abort', abort, { once: true });
        cancelled.addEventListener('abort', abort, { once: true });
        try {
          for await (const raw of this.transport.subscribe(url, filter, linked.signal)) {
            if (linked.signal.aborted) break;
            sink.push(raw);
          }
        } finally {
          timeout.removeEventListener('abort', abort);
          cancelled.removeEventListener('abort', abort);
        }
      });
      this.registry.recordSuccess(url, this.now());
    } catch (error) {
      if (cancelled.aborted) return;
      const reason = describeError(error);
      this.registry.recordFailure(url, this.now(), reason);
      this.logger.warn(`Fetch from ${url} failed: ${reason}`);
    }
  }

  private enqueue(url: string, record: WireRecord): void {
    if (!this.registry.has(url)) return;
    const key = pendingKey(url, record.id);
    const existing = this.pending.get(key);
    if (existing) {
      existing.attempts += 1;
      return;
    }
    this.pending.set(key, { url, record, attempts: 1, queuedAt: this.now() });
    this.enforcePendingLimit();
  }

  private enforcePendingLimit(): void {
    while (this.pending.size > this.maxPendingDeliveries) {
      const oldest = this.pending.keys().next();
      if (oldest.done) return;
      const dropped = this.pending.get(oldest.value);
      this.pending.delete(oldest.value);
      this.logger.warn(
        `Pending delivery queue is full; dropped ${dropped?.record.id ?? 'unknown'} for ${dropped?.url ?? 'unknown'}`
      );
    }
  }
}
