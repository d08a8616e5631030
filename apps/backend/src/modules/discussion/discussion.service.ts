import { Injectable, Logger } from '@nestjs/common';
import {
  DiscussionPostResponse,
  DiscussionResponse,
  DiscussionTopicResponse,
  MessageResponse,
  TopicsResponse,
} from '@discussion/shared-types';
import { DiscourseService } from '@modules/discourse/discourse.service';
import { AssetCategoryService } from '@modules/asset-category/asset-category.service';
import { ModerationEventPublisher } from '@modules/moderation/moderation-event.publisher';
import { NotificationService } from '@modules/notification/notification.service';
import { AuthServiceClient } from '@modules/collaborators/auth-service.client';
import { AuthenticatedUser } from '@modules/auth/interfaces/authenticated-user.interface';
import { Role } from '@modules/access/enums/role.enum';
import {
  DiscourseResourceUnavailableError,
  TopicDeletionForbiddenError,
} from '@common/exceptions/discussion.exceptions';
import { MISSING_CATEGORY_ERROR_MESSAGE } from '@common/constants/discussion.constants';
import { CreateTopicDto } from './dto/create-topic.dto';
import {
  ModerateTopicDto,
  ModeratePostDto,
} from './dto/moderation-callback.dto';
import {
  toDiscussionResponse,
  toPostResponse,
  toTopicResponse,
} from './discussion.mapper';

@Injectable()
export class DiscussionService {
  private readonly logger = new Logger(DiscussionService.name);

  constructor(
    private readonly discourseService: DiscourseService,
    private readonly assetCategoryService: AssetCategoryService,
    private readonly moderationPublisher: ModerationEventPublisher,
    private readonly notificationService: NotificationService,
    private readonly authServiceClient: AuthServiceClient,
  ) {}

  /** Category of the asset with its topics, provisioning the category on first access. */
  async getDiscussion(assetId: string): Promise<DiscussionResponse> {
    const categoryId = await this.assetCategoryService.lookup(assetId);
    const category = await this.discourseService.getCategory(
      categoryId,
      assetId,
    );
    const topics = await this.discourseService.getTopics(
      category.slug,
      category.id,
    );
    return toDiscussionResponse(category, topics);
  }

  async getTopics(slug: string, categoryId: number): Promise<TopicsResponse> {
    const topics = await this.discourseService.getTopics(slug, categoryId);
    return { topics: topics.map((topic) => toTopicResponse(topic)) };
  }

  async getTopic(topicId: number): Promise<DiscussionTopicResponse> {
    const { topic, posts } =
      await this.discourseService.getTopicWithPosts(topicId);
    return toTopicResponse(topic, posts);
  }

  async createTopic(
    dto: CreateTopicDto,
    caller: AuthenticatedUser | undefined,
  ): Promise<DiscussionPostResponse> {
    const user = await this.discourseService.ensureUser(caller);
    const assetId = dto.asset_id.toLowerCase();

    const categoryId = await this.assetCategoryService.lookup(assetId);
    if (categoryId === null) {
      throw new DiscourseResourceUnavailableError(
        `Topic creation failed, asset ${assetId} has no category`,
        MISSING_CATEGORY_ERROR_MESSAGE,
      );
    }
    this.logger.debug(`Found category ${categoryId} for asset ${assetId}`);

    const post = await this.discourseService.createTopic(
      user.username,
      categoryId,
      dto.title,
      dto.text,
    );
    await this.moderationPublisher.sendTopicToModeration(
      post.topic_id,
      dto.title,
      user,
    );
    await this.moderationPublisher.sendPostToModeration(post, dto.text, user);
    this.logger.log(`Topic ${post.topic_id} created by ${user.username}`);

    await this.notificationService.notifyTopicCreated(assetId, dto.title, user);
    return toPostResponse(post);
  }

  /**
   * Only the creator of a topic or an admin may delete it. Roles come from
   * the identity service, asked with the caller's own credentials.
   */
  async deleteTopic(
    topicId: number,
    caller: AuthenticatedUser | undefined,
    authorization: string | undefined,
  ): Promise<MessageResponse> {
    const user = await this.discourseService.ensureUser(caller);
    const topic = await this.discourseService.getTopic(topicId);

    if (topic.username !== user.username) {
      const roles =
        await this.authServiceClient.getCurrentUserRoles(authorization);
      if (!roles.includes(Role.ADMIN)) {
        this.logger.warn(
          `${user.username} tried to delete topic ${topicId} owned by ${topic.username}`,
        );
        throw new TopicDeletionForbiddenError();
      }
    }

    await this.discourseService.deleteTopic(topicId);
    this.logger.log(`Topic ${topicId} deleted by ${user.username}`);
    return { message: 'Topic deleted successfully' };
  }

  async createPost(
    topicId: number,
    text: string,
    caller: AuthenticatedUser | undefined,
  ): Promise<DiscussionPostResponse> {
    const user = await this.discourseService.ensureUser(caller);
    const post = await this.discourseService.createPost(
      user.username,
      topicId,
      text,
    );
    await this.moderationPublisher.sendPostToModeration(post, text, user);
    return toPostResponse(post);
  }

  async editPost(
    postId: number,
    text: string,
  ): Promise<DiscussionPostResponse> {
    const post = await this.discourseService.editPost(postId, text);
    return toPostResponse(post);
  }

  /** Reject callback for a post: blanks it and tells its author. */
  async moderatePost(
    postId: number,
    dto: ModeratePostDto,
    caller: AuthenticatedUser | undefined,
  ): Promise<DiscussionPostResponse> {
    const user = await this.discourseService.ensureUser(caller);
    const original = await this.discourseService.getPost(postId);
    const edited = await this.discourseService.editPost(postId, dto.text);

    const recipient = await this.notificationService.resolveRecipient(
      user,
      dto.author_id,
    );
    await this.notificationService.notifyPostRejected(
      recipient,
      original.cooked,
    );
    this.logger.log(`Post ${postId} moderated by ${user.username}`);
    return toPostResponse(edited);
  }

  /** Reject callback for a topic: deletes it and tells its author. */
  async moderateTopic(
    topicId: number,
    dto: ModerateTopicDto,
    caller: AuthenticatedUser | undefined,
  ): Promise<MessageResponse> {
    const user = await this.discourseService.ensureUser(caller);
    const topic = await this.discourseService.getTopic(topicId);
    await this.discourseService.deleteTopic(topicId);

    const recipient = await this.notificationService.resolveRecipient(
      user,
      dto.author_id,
    );
    await this.notificationService.notifyTopicRejected(recipient, topic.title);
    this.logger.log(`Topic ${topicId} moderated by ${user.username}`);
    return { message: 'Topic moderated successfully' };
  }
}
