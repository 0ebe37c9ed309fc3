import { Controller, Get, Inject } from '@nestjs/common';
import { RelayGateway, type RelaySnapshot } from '@folio/relay-gateway';

const toIso = (timestamp: number | null): string | null =>
  timestamp === null ? null : new Date(timestamp).toISOString();

@Controller('relays')
export class RelaysController {
  constructor(@Inject(RelayGateway) private readonly gateway: RelayGateway) {}

  @Get()
  list() {
    return {
      relays: this.gateway.listRelays().map((relay: RelaySnapshot) => ({
        url: relay.url,
        failures: relay.failures,
        cooldownUntil: toIso(relay.cooldownUntil),
        lastSuccessAt: toIso(relay.lastSuccessAt),
        lastFailureAt: toIso(relay.lastFailureAt),
        lastError: relay.lastError,
      })),
      pendingDeliveries: this.gateway.pendingDeliveries,
    };
  }
}
