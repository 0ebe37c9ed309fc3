import { Inject, Injectable, Logger } from '@nestjs/common';
import type { SignedRecord } from '@folio/record-codec';
import { RelayGateway, RelayOutcomeKinds } from '@folio/relay-gateway';
import {
  RecordPropagator,
  type PropagationReport,
} from '@publishing/application/ports/record-propagator';

@Injectable()
export class GatewayRecordPropagator extends RecordPropagator {
  private readonly logger = new Logger(GatewayRecordPropagator.name);

  constructor(@Inject(RelayGateway) private readonly gateway: RelayGateway) {
    super();
  }

  async propagate(record: SignedRecord): Promise<PropagationReport> {
    const report = await this.gateway.publish(record);
    const outcomes = Object.values(report.outcomes);
    const sent = outcomes.filter(
      (outcome) => outcome.kind === RelayOutcomeKinds.sent
    ).length;
    this.logger.log(
      `Record ${record.recordId} reached ${sent}/${outcomes.length} relays`
    );
    return report.outcomes;
  }
}
