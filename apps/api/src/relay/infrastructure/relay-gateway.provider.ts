import { Logger, type FactoryProvider } from '@nestjs/common';
import {
  RelayGateway,
  WebSocketRelayTransport,
  type RelayTransportPort,
} from '@folio/relay-gateway';
import {
  FOLIO_SETTINGS,
  type FolioSettings,
} from '@platform/config/folio-settings';

export const createRelayGateway = (
  settings: FolioSettings,
  transport?: RelayTransportPort
): RelayGateway => {
  const logger = new Logger(RelayGateway.name);
  const { relays } = settings;
  return new RelayGateway({
    relays: relays.urls,
    transport: transport ?? new WebSocketRelayTransport({ logger }),
    backoff: relays.backoff,
    timeoutMs: relays.timeoutMs,
    maxConcurrency: relays.maxConcurrency,
    minContentLength: relays.minContentLength,
    retryIntervalMs: relays.retryIntervalMs,
    logger,
    onFetchComplete: (stats) => {
      const discarded = Object.values(stats.discarded).reduce(
        (total, count) => total + count,
        0
      );
      logger.debug(
        `Fetched from ${stats.relays.length} relays: ${stats.received} received, ${stats.yielded} verified, ${discarded} discarded`
      );
    },
  });
};

export const relayGatewayProvider: FactoryProvider<RelayGateway> = {
  provide: RelayGateway,
  inject: [FOLIO_SETTINGS],
  useFactory: (settings: FolioSettings) => createRelayGateway(settings),
};
