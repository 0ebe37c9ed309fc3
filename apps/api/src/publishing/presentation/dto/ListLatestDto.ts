import { Type } from 'class-transformer';
import {
  IsInt,
  IsOptional,
  IsString,
  Matches,
  Max,
  MaxLength,
  Min,
} from 'class-validator';

const AUTHOR_KEY_REGEX = /^[0-9a-fA-F]{64}$/;

export class ListLatestDto {
  @IsOptional()
  @IsString()
  @Matches(AUTHOR_KEY_REGEX, { message: 'author must be a 64-character hex key' })
  author?: string;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  tag?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  sinceDays?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  limit?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset?: number;
}
