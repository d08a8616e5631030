import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Req,
  UseFilters,
  UseGuards,
  UsePipes,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import {
  DataEnvelope,
  DiscussionPostResponse,
  DiscussionResponse,
  DiscussionTopicResponse,
  MessageResponse,
  TopicsResponse,
} from '@discussion/shared-types';
import { OptionalJwtAuthGuard } from '@modules/auth/guards/optional-jwt-auth.guard';
import { RolesGuard } from '@modules/access/guards/roles.guard';
import { Roles } from '@modules/access/decorators/roles.decorator';
import { Role } from '@modules/access/enums/role.enum';
import { RequestWithUser } from '@common/interfaces/request-with-user.interface';
import { CustomValidationPipe } from '@common/pipes/validation.pipe';
import { ParseAssetIdPipe } from '@common/pipes/parse-asset-id.pipe';
import { DiscussionExceptionFilter } from '@common/filters/discussion-exception.filter';
import { DiscussionService } from './discussion.service';
import { CreateTopicDto } from './dto/create-topic.dto';
import { CreatePostDto } from './dto/create-post.dto';
import { EditPostDto } from './dto/edit-post.dto';
import {
  ModeratePostDto,
  ModerateTopicDto,
} from './dto/moderation-callback.dto';

@Controller()
@ApiTags('discussion')
@UseGuards(OptionalJwtAuthGuard, RolesGuard)
@UsePipes(CustomValidationPipe)
@UseFilters(DiscussionExceptionFilter)
export class DiscussionController {
  constructor(private readonly discussionService: DiscussionService) {}

  @Get('discussion/:assetId')
  @ApiOperation({
    summary:
      'Returns the topics of the category of an asset, creating the category on first access',
  })
  @ApiParam({ name: 'assetId', format: 'uuid' })
  async getDiscussion(
    @Param('assetId', ParseAssetIdPipe) assetId: string,
  ): Promise<DataEnvelope<DiscussionResponse>> {
    return { data: await this.discussionService.getDiscussion(assetId) };
  }

  @Get('topics/:slug/:category')
  @ApiOperation({ summary: 'Returns the topics of a category' })
  @ApiResponse({ status: 404, description: 'Unknown category' })
  async getTopics(
    @Param('slug') slug: string,
    @Param('category', ParseIntPipe) category: number,
  ): Promise<DataEnvelope<TopicsResponse>> {
    return { data: await this.discussionService.getTopics(slug, category) };
  }

  @Get('topic/:topicId')
  @ApiOperation({ summary: 'Returns a topic with all of its posts' })
  async getTopic(
    @Param('topicId', ParseIntPipe) topicId: number,
  ): Promise<DataEnvelope<DiscussionTopicResponse>> {
    return { data: await this.discussionService.getTopic(topicId) };
  }

  @Post('topic')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Opens a topic in the category of an asset' })
  @ApiResponse({ status: 400, description: 'Title or text too short' })
  async createTopic(
    @Body() dto: CreateTopicDto,
    @Req() req: RequestWithUser,
  ): Promise<DataEnvelope<DiscussionPostResponse>> {
    return { data: await this.discussionService.createTopic(dto, req.user) };
  }

  @Delete('topic/:topicId')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Deletes a topic, for its creator or an admin' })
  @ApiResponse({ status: 403, description: 'Neither creator nor admin' })
  async deleteTopic(
    @Param('topicId', ParseIntPipe) topicId: number,
    @Req() req: RequestWithUser,
  ): Promise<DataEnvelope<MessageResponse>> {
    return {
      data: await this.discussionService.deleteTopic(
        topicId,
        req.user,
        req.headers.authorization,
      ),
    };
  }

  @Post('topic/:topicId')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Replies to a topic' })
  async createPost(
    @Param('topicId', ParseIntPipe) topicId: number,
    @Body() dto: CreatePostDto,
    @Req() req: RequestWithUser,
  ): Promise<DataEnvelope<DiscussionPostResponse>> {
    return {
      data: await this.discussionService.createPost(
        topicId,
        dto.text,
        req.user,
      ),
    };
  }

  @Put('post/:postId')
  @ApiBearerAuth()
  @Roles(Role.MODERATOR, Role.ADMIN)
  @ApiOperation({ summary: 'Replaces the text of a post' })
  async editPost(
    @Param('postId', ParseIntPipe) postId: number,
    @Body() dto: EditPostDto,
  ): Promise<DataEnvelope<DiscussionPostResponse>> {
    return { data: await this.discussionService.editPost(postId, dto.text) };
  }

  @Put('post/moderate/:postId')
  @ApiBearerAuth()
  @Roles(Role.MODERATOR, Role.ADMIN)
  @ApiOperation({
    summary: 'Reject callback: blanks a post and notifies its author',
  })
  async moderatePost(
    @Param('postId', ParseIntPipe) postId: number,
    @Body() dto: ModeratePostDto,
    @Req() req: RequestWithUser,
  ): Promise<DataEnvelope<DiscussionPostResponse>> {
    return {
      data: await this.discussionService.moderatePost(postId, dto, req.user),
    };
  }

  @Delete('topic/moderate/:topicId')
  @ApiBearerAuth()
  @Roles(Role.ADMIN)
  @ApiOperation({
    summary: 'Reject callback: deletes a topic and notifies its author',
  })
  async moderateTopic(
    @Param('topicId', ParseIntPipe) topicId: number,
    @Body() dto: ModerateTopicDto,
    @Req() req: RequestWithUser,
  ): Promise<DataEnvelope<MessageResponse>> {
    return {
      data: await this.discussionService.moderateTopic(
        topicId,
        dto,
        req.user,
      ),
    };
  }
}
