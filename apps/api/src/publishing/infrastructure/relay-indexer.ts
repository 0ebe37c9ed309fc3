import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { RelayGateway } from '@folio/relay-gateway';
import {
  FOLIO_SETTINGS,
  type FolioSettings,
} from '@platform/config/folio-settings';
import {
  RecordIngestService,
  type IngestSummary,
} from '../application/record-ingest.service';

/**
 * Periodically pulls long-form records from the relays into the local store.
 * Each pass asks only for records at or after the newest one seen so far,
 * capped at the current time so a future-dated record cannot hide later ones.
 */
@Injectable()
export class RelayIndexer implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(RelayIndexer.name);
  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<IngestSummary> | null = null;
  private since: number | undefined;

  constructor(
    @Inject(RelayGateway) private readonly gateway: RelayGateway,
    @Inject(RecordIngestService) private readonly ingest: RecordIngestService,
    @Inject(FOLIO_SETTINGS) private readonly settings: FolioSettings
  ) {}

  onApplicationBootstrap(): void {
    if (!this.settings.indexer.enabled) {
      this.logger.log('Relay indexer disabled');
      return;
    }
    this.start();
  }

  onModuleDestroy(): void {
    this.stop();
  }

  start(): void {
    if (this.timer) return;
    const tick = () => {
      this.runOnce().catch((error: unknown) => {
        this.logger.error(
          `Indexer pass failed: ${error instanceof Error ? error.message : String(error)}`
        );
      });
    };
    this.timer = setInterval(tick, this.settings.indexer.intervalMs);
    this.timer.unref();
    tick();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** Concurrent calls share one pass. */
  runOnce(): Promise<IngestSummary> {
    if (!this.running) {
      this.running = this.pass().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  private async pass(): Promise<IngestSummary> {
    const summary = await this.ingest.ingest(
      this.gateway.fetch({
        since: this.since,
        limit: this.settings.indexer.limit,
      })
    );
    if (summary.newestCreatedAt !== null) {
      const now = Math.floor(Date.now() / 1000);
      this.since = Math.min(summary.newestCreatedAt, now);
    }
    if (summary.received > 0) {
      this.logger.log(
        `Indexed ${summary.accepted} of ${summary.received} records (${summary.duplicates} known, ${summary.stale} stale, ${summary.forks} forks, ${summary.failed} failed)`
      );
    }
    return summary;
  }
}
