import type { SignedRecord } from '@folio/record-codec';
import type { RelayOutcome } from '@folio/relay-gateway';

export type PropagationReport = Readonly<Record<string, RelayOutcome>>;

/**
 * Best-effort delivery of a committed record to remote peers.
 */
export abstract class RecordPropagator {
  abstract propagate(record: SignedRecord): Promise<PropagationReport>;
}
