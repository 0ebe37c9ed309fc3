import { Module } from '@nestjs/common';
import { PublishingDatabaseService } from './database.service';

@Module({
  providers: [PublishingDatabaseService],
  exports: [PublishingDatabaseService],
})
export class PublishingDatabaseModule {}
