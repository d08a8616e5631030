import { ApiProperty } from '@nestjs/swagger';
import { IsString, Matches, MinLength } from 'class-validator';
import {
  CONTENT_TOO_SHORT,
  MIN_CONTENT_LENGTH,
  MIN_TITLE_LENGTH,
  TITLE_TOO_SHORT,
  UUID_PATTERN,
} from '@common/constants/discussion.constants';

// Property order matters: the first failing property is the one reported
export class CreateTopicDto {
  @ApiProperty({ minLength: MIN_TITLE_LENGTH })
  @IsString({ message: TITLE_TOO_SHORT })
  @MinLength(MIN_TITLE_LENGTH, { message: TITLE_TOO_SHORT })
  title!: string;

  @ApiProperty({ minLength: MIN_CONTENT_LENGTH })
  @IsString({ message: CONTENT_TOO_SHORT })
  @MinLength(MIN_CONTENT_LENGTH, { message: CONTENT_TOO_SHORT })
  text!: string;

  @ApiProperty({ format: 'uuid' })
  @IsString({ message: 'asset_id must be a valid UUID' })
  @Matches(UUID_PATTERN, { message: 'asset_id must be a valid UUID' })
  asset_id!: string;
}
