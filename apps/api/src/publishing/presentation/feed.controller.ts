import {
  BadRequestException,
  Controller,
  Get,
  Inject,
  NotFoundException,
  Param,
  Query,
  ValidationPipe,
} from '@nestjs/common';
import { FeedQueryError, FeedService } from '../application/feed.service';
import { AuthorHistoryDto } from './dto/AuthorHistoryDto';
import { ListLatestDto } from './dto/ListLatestDto';
import { toRecordResponse } from './record.response';

const queryPipe = new ValidationPipe({
  transform: true,
  whitelist: true,
  expectedType: ListLatestDto,
});

const historyPipe = new ValidationPipe({
  transform: true,
  whitelist: true,
  expectedType: AuthorHistoryDto,
});

@Controller('records')
export class FeedController {
  constructor(@Inject(FeedService) private readonly feed: FeedService) {}

  @Get()
  async list(@Query(queryPipe) dto: ListLatestDto) {
    const records = await this.guard(() => this.feed.listLatest(dto));
    return { records: records.map(toRecordResponse) };
  }

  @Get('by-id/:recordId')
  async byId(@Param('recordId') recordId: string) {
    const record = await this.feed.findRecord(recordId);
    if (!record) {
      throw new NotFoundException(`Record ${recordId} not found`);
    }
    return toRecordResponse(record);
  }

  @Get(':authorKey/history')
  async authorHistory(
    @Param('authorKey') authorKey: string,
    @Query(historyPipe) dto: AuthorHistoryDto
  ) {
    const records = await this.guard(() =>
      this.feed.authorHistory(authorKey, dto.limit)
    );
    return { records: records.map(toRecordResponse) };
  }

  @Get(':authorKey/:stableId/history')
  async history(
    @Param('authorKey') authorKey: string,
    @Param('stableId') stableId: string
  ) {
    const records = await this.guard(() =>
      this.feed.history(authorKey, stableId)
    );
    return { records: records.map(toRecordResponse) };
  }

  private async guard<T>(run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof FeedQueryError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }
}
