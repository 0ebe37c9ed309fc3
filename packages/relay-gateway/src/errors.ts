export class RelayTimeoutError extends Error {
  constructor(
    readonly url: string,
    readonly timeoutMs: number
  ) {
    super(`Relay ${url} timed out after ${timeoutMs}ms`);
    this.name = 'RelayTimeoutError';
  }
}

export class RelayRejectedError extends Error {
  constructor(
    readonly url: string,
    readonly relayMessage: string
  ) {
    super(`Relay ${url} rejected record: ${relayMessage || 'no reason given'}`);
    this.name = 'RelayRejectedError';
  }
}

export class RelayProtocolError extends Error {
  constructor(
    message: string,
    override readonly cause?: unknown
  ) {
    super(message);
    this.name = 'RelayProtocolError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
