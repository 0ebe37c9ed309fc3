import { Module } from '@nestjs/common';
import { RelayGateway } from '@folio/relay-gateway';
import { RecordPropagator } from '@publishing/application/ports/record-propagator';
import { GatewayRecordPropagator } from '../infrastructure/gateway-record-propagator';
import { relayGatewayProvider } from '../infrastructure/relay-gateway.provider';
import { RelayRetryLoop } from '../infrastructure/relay-retry-loop';
import { RelaysController } from './relays.controller';

@Module({
  controllers: [RelaysController],
  providers: [
    relayGatewayProvider,
    RelayRetryLoop,
    {
      provide: RecordPropagator,
      useClass: GatewayRecordPropagator,
    },
  ],
  exports: [RelayGateway, RecordPropagator],
})
export class RelayModule {}
