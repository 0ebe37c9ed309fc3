import { randomUUID } from 'node:crypto';
import { WebSocket, type RawData } from 'ws';
import { RECORD_KIND, type WireRecord } from '@folio/record-codec';
import { AsyncQueue } from './asyncQueue';
import { RelayProtocolError } from './errors';
import type {
  GatewayLogger,
  RelayAck,
  RelayFilter,
  RelayTransportPort,
} from './types';

export type WebSocketRelayTransportOptions = Readonly<{
  /** Factory seam for tests; defaults to `new WebSocket(url)`. */
  connect?: (url: string) => WebSocket;
  /** Receives socket errors raised after a call has settled. */
  logger?: Pick<GatewayLogger, 'debug'>;
}>;

type ProtocolFilter = {
  kinds: number[];
  authors?: string[];
  '#d'?: string[];
  since?: number;
  limit?: number;
};

export const toProtocolFilter = (filter: RelayFilter): ProtocolFilter => {
  const protocol: ProtocolFilter = { kinds: [RECORD_KIND] };
  if (filter.authors && filter.authors.length > 0) {
    protocol.authors = [...filter.authors];
  }
  if (filter.stableIds && filter.stableIds.length > 0) {
    protocol['#d'] = [...filter.stableIds];
  }
  if (filter.since !== undefined) {
    protocol.since = filter.since;
  }
  if (filter.limit !== undefined) {
    protocol.limit = filter.limit;
  }
  return protocol;
};

/** Parses a relay frame into its array form; anything else is `null`. */
export const parseFrame = (data: RawData | string): unknown[] | null => {
  const text = typeof data === 'string' ? data : rawDataToString(data);
  try {
    const parsed: unknown = JSON.parse(text);
    return Array.isArray(parsed) && typeof parsed[0] === 'string' ? parsed : null;
  } catch {
    return null;
  }
};

const rawDataToString = (data: RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
};

const abortError = (url: string): RelayProtocolError =>
  new RelayProtocolError(`Request to ${url} was aborted`);

/**
 * Relay transport over WebSockets. One connection per call; the connection is
 * closed when the call settles or its signal aborts.
 */
export class WebSocketRelayTransport implements RelayTransportPort {
  private readonly connect: (url: string) => WebSocket;
  private readonly logger: Pick<GatewayLogger, 'debug'>;

  constructor(options: WebSocketRelayTransportOptions = {}) {
    this.connect = options.connect ?? ((url) => new WebSocket(url));
    this.logger = options.logger ?? {};
  }

  async publish(
    url: string,
    record: WireRecord,
    signal: AbortSignal
  ): Promise<RelayAck> {
    const socket = await this.open(url, signal);
    try {
      return await new Promise<RelayAck>((resolve, reject) => {
        const cleanup = () => {
          socket.off('message', onMessage);
          socket.off('close', onClose);
          socket.off('error', onError);
          signal.removeEventListener('abort', onAbort);
        };
        const onMessage = (data: RawData) => {
          const frame = parseFrame(data);
          if (!frame || frame[0] !== 'OK' || frame[1] !== record.id) return;
          cleanup();
          resolve({
            accepted: frame[2] === true,
            message: typeof frame[3] === 'string' ? frame[3] : '',
          });
        };
        const onClose = () => {
          cleanup();
          reject(
            new RelayProtocolError(`Relay ${url} closed before acknowledging`)
          );
        };
        const onError = (error: Error) => {
          cleanup();
          reject(new RelayProtocolError(`Relay ${url} errored`, error));
        };
        const onAbort = () => {
          cleanup();
          reject(abortError(url));
        };
        socket.on('message', onMessage);
        socket.on('close', onClose);
        socket.on('error', onError);
        signal.addEventListener('abort', onAbort, { once: true });
        socket.send(JSON.stringify(['EVENT', record]));
      });
    } finally {
      socket.close();
    }
  }

  async *subscribe(
    url: string,
    filter: RelayFilter,
    signal: AbortSignal
  ): AsyncGenerator<unknown, void, undefined> {
    const socket = await this.open(url, signal);
    const subscriptionId = `folio-${randomUUID().slice(0, 8)}`;
    const frames = new AsyncQueue<unknown[]>();
    const onMessage = (data: RawData) => {
      const frame = parseFrame(data);
      if (frame && frame[1] === subscriptionId) frames.push(frame);
    };
    const onClose = () => frames.end();
    const onError = (error: Error) =>
      frames.fail(new RelayProtocolError(`Relay ${url} errored`, error));
    const onAbort = () => frames.fail(abortError(url));
    socket.on('message', onMessage);
    socket.on('close', onClose);
    socket.on('error', onError);
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      socket.send(
        JSON.stringify(['REQ', subscriptionId, toProtocolFilter(filter)])
      );
      for await (const frame of frames) {
        if (frame[0] === 'EVENT' && frame.length >= 3) {
          yield frame[2];
        } else if (frame[0] === 'EOSE') {
          return;
        } else if (frame[0] === 'CLOSED') {
          throw new RelayProtocolError(
            `Relay ${url} closed subscription: ${String(frame[2] ?? '')}`
          );
        }
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
      socket.off('message', onMessage);
      socket.off('close', onClose);
      socket.off('error', onError);
      if (socket.readyState === WebSocket.OPEN) {
        socket.send(JSON.stringify(['CLOSE', subscriptionId]));
      }
      socket.close();
    }
  }

  private open(url: string, signal: AbortSignal): Promise<WebSocket> {
    if (signal.aborted) {
      return Promise.reject(abortError(url));
    }
    const socket = this.connect(url);
    // ws throws 'error' events that have no listener; this one lives as long
    // as the socket, past the per-call listeners.
    socket.on('error', (error: Error) => {
      this.logger.debug?.(`Relay ${url} socket error: ${error.message}`);
    });
    return new Promise<WebSocket>((resolve, reject) => {
      const cleanup = () => {
        socket.off('open', onOpen);
        socket.off('error', onError);
        signal.removeEventListener('abort', onAbort);
      };
      const onOpen = () => {
        cleanup();
        resolve(socket);
      };
      const onError = (error: Error) => {
        cleanup();
        reject(new RelayProtocolError(`Could not connect to ${url}`, error));
      };
      const onAbort = () => {
        socket.off('open', onOpen);
        socket.terminate();
        reject(abortError(url));
      };
      socket.on('open', onOpen);
      socket.on('error', onError);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
