import { Injectable } from '@nestjs/common';
import { DatabaseService } from '@platform/infrastructure/database/database.service';
import type { PublishingDatabase } from './database.types';

@Injectable()
export class PublishingDatabaseService extends DatabaseService<PublishingDatabase> {}
