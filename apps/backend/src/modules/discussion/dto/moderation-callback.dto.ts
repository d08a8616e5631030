import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString } from 'class-validator';
import { EditPostDto } from './edit-post.dto';

/** Body of the reject callback deleting a topic. */
export class ModerateTopicDto {
  // Sent by the moderation callback, unused since the topic is deleted
  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  text?: string;

  @ApiPropertyOptional({ description: 'Author of the moderated content' })
  @IsOptional()
  @IsString()
  author_id?: string;
}

/** Body of the reject callback blanking a post. */
export class ModeratePostDto extends EditPostDto {
  @ApiPropertyOptional({ description: 'Author of the moderated content' })
  @IsOptional()
  @IsString()
  author_id?: string;
}
