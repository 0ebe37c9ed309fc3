export * from './types';
export {
  RelayProtocolError,
  RelayRejectedError,
  RelayTimeoutError,
  describeError,
} from './errors';
export { DEFAULT_BACKOFF, RelayBackoff } from './RelayBackoff';
export { RelayRegistry, normalizeRelayUrl } from './RelayRegistry';
export { DEFAULT_MIN_CONTENT_LENGTH, screenCandidate } from './acceptance';
export type { ScreeningResult } from './acceptance';
export { AsyncQueue } from './asyncQueue';
export { createLimiter, runWithTimeout } from './concurrency';
export type { Limiter } from './concurrency';
export {
  DEFAULT_MAX_CONCURRENCY,
  DEFAULT_MAX_PENDING_DELIVERIES,
  DEFAULT_RETRY_INTERVAL_MS,
  DEFAULT_TIMEOUT_MS,
  RelayGateway,
} from './RelayGateway';
export { WebSocketRelayTransport } from './WebSocketRelayTransport';
export type { WebSocketRelayTransportOptions } from './WebSocketRelayTransport';
