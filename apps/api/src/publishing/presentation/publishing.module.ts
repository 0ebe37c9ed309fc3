import { Module } from '@nestjs/common';
import { RelayModule } from '@relay/presentation/relay.module';
import { DraftService } from '../application/draft.service';
import { FeedService } from '../application/feed.service';
import { DraftRepository } from '../application/ports/draft-repository';
import { RecordRepository } from '../application/ports/record-repository';
import { PublishService } from '../application/publish.service';
import { RecordIngestService } from '../application/record-ingest.service';
import { VersionResolver } from '../application/version-resolver';
import { PublishingDatabaseModule } from '../infrastructure/database.module';
import {
  INSTANCE_SIGNER,
  instanceSignerProvider,
} from '../infrastructure/instance-signer.provider';
import { KyselyDraftRepository } from '../infrastructure/kysely-draft.repository';
import { KyselyRecordRepository } from '../infrastructure/kysely-record.repository';
import { RelayIndexer } from '../infrastructure/relay-indexer';
import { AuthorController } from './author.controller';
import { FeedController } from './feed.controller';

@Module({
  imports: [PublishingDatabaseModule, RelayModule],
  controllers: [FeedController, AuthorController],
  providers: [
    VersionResolver,
    PublishService,
    DraftService,
    FeedService,
    RecordIngestService,
    RelayIndexer,
    instanceSignerProvider,
    {
      provide: RecordRepository,
      useClass: KyselyRecordRepository,
    },
    {
      provide: DraftRepository,
      useClass: KyselyDraftRepository,
    },
  ],
  exports: [PublishService, DraftService, FeedService, INSTANCE_SIGNER],
})
export class PublishingModule {}
