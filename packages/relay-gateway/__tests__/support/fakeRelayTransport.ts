import type { WireRecord } from '@folio/record-codec';
import type { RelayAck, RelayFilter, RelayTransportPort } from '../../src/types';

export type PublishBehaviour = 'accept' | 'reject' | 'hang' | 'error';

const waitForAbort = (signal: AbortSignal): Promise<never> =>
  new Promise<never>((_resolve, reject) => {
    if (signal.aborted) {
      reject(new Error('aborted'));
      return;
    }
    signal.addEventListener('abort', () => reject(new Error('aborted')), {
      once: true,
    });
  });

/** In-process relay stand-in keyed by relay URL. */
export class FakeRelayTransport implements RelayTransportPort {
  readonly published: Array<{ url: string; recordId: string }> = [];
  readonly subscriptions: Array<{ url: string; filter: RelayFilter }> = [];
  private readonly behaviours = new Map<string, PublishBehaviour>();
  private readonly stored = new Map<string, unknown[]>();
  private readonly hanging = new Set<string>();

  setBehaviour(url: string, behaviour: PublishBehaviour): void {
    this.behaviours.set(url, behaviour);
  }

  store(url: string, ...items: unknown[]): void {
    this.stored.set(url, [...(this.stored.get(url) ?? []), ...items]);
  }

  /** Keeps the subscription open after stored items until aborted. */
  hangAfterStored(url: string): void {
    this.hanging.add(url);
  }

  async publish(
    url: string,
    record: WireRecord,
    signal: AbortSignal
  ): Promise<RelayAck> {
    this.published.push({ url, recordId: record.id });
    const behaviour = this.behaviours.get(url) ?? 'accept';
    if (behaviour === 'hang') return waitForAbort(signal);
    if (behaviour === 'error') throw new Error('connection refused');
    return behaviour === 'reject'
      ? { accepted: false, message: 'blocked: spam' }
      : { accepted: true, message: '' };
  }

  async *subscribe(
    url: string,
    filter: RelayFilter,
    signal: AbortSignal
  ): AsyncGenerator<unknown, void, undefined> {
    this.subscriptions.push({ url, filter });
    for (const item of this.stored.get(url) ?? []) {
      yield item;
    }
    if (this.hanging.has(url)) {
      await waitForAbort(signal);
    }
  }
}
