import type { SignedRecord, WireRecord } from '@folio/record-codec';

export const RelayOutcomeKinds = {
  sent: 'sent',
  failed: 'failed',
  skipped: 'skipped',
} as const;

export type RelayOutcomeKind =
  (typeof RelayOutcomeKinds)[keyof typeof RelayOutcomeKinds];

export type RelayOutcome =
  | Readonly<{ kind: typeof RelayOutcomeKinds.sent; latencyMs: number }>
  | Readonly<{ kind: typeof RelayOutcomeKinds.failed; reason: string }>
  | Readonly<{ kind: typeof RelayOutcomeKinds.skipped; retryAt: number }>;

/** Outcome per relay URL for one record. */
export type PublishReport = Readonly<{
  recordId: string;
  outcomes: Readonly<Record<string, RelayOutcome>>;
}>;

export const DiscardReasons = {
  malformed: 'malformed',
  missingIdentity: 'missing_identity',
  contentTooShort: 'content_too_short',
  duplicate: 'duplicate',
  invalidFields: 'invalid_fields',
  verificationFailed: 'verification_failed',
} as const;

export type DiscardReason = (typeof DiscardReasons)[keyof typeof DiscardReasons];

export type FetchStats = Readonly<{
  relays: ReadonlyArray<string>;
  received: number;
  yielded: number;
  discarded: Readonly<Record<DiscardReason, number>>;
}>;

/** Subscription filter sent to relays, in relay protocol field names. */
export type RelayFilter = Readonly<{
  authors?: ReadonlyArray<string>;
  stableIds?: ReadonlyArray<string>;
  since?: number;
  limit?: number;
}>;

export type RelayAck = Readonly<{
  accepted: boolean;
  message: string;
}>;

export interface RelayTransportPort {
  /** Sends a record and resolves with the relay's acknowledgement. */
  publish(url: string, record: WireRecord, signal: AbortSignal): Promise<RelayAck>;
  /** Streams raw candidate records until end-of-stored-events or abort. */
  subscribe(
    url: string,
    filter: RelayFilter,
    signal: AbortSignal
  ): AsyncIterable<unknown>;
}

export type BackoffPolicy = Readonly<{
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
}>;

export interface GatewayLogger {
  log(message: string): void;
  warn(message: string): void;
  debug?(message: string): void;
}

export type RelayGatewayOptions = Readonly<{
  relays: ReadonlyArray<string>;
  transport: RelayTransportPort;
  backoff?: Partial<BackoffPolicy>;
  timeoutMs?: number;
  /** Applies to publish deliveries and fetch subscriptions separately. */
  maxConcurrency?: number;
  minContentLength?: number;
  retryIntervalMs?: number;
  maxPendingDeliveries?: number;
  logger?: GatewayLogger;
  now?: () => number;
  verify?: (record: SignedRecord) => boolean;
  onFetchComplete?: (stats: FetchStats) => void;
}>;

export type RelaySnapshot = Readonly<{
  url: string;
  failures: number;
  cooldownUntil: number | null;
  lastSuccessAt: number | null;
  lastFailureAt: number | null;
  lastError: string | null;
}>;
