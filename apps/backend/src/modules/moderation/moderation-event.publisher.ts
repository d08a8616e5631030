import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { MessagePublisherService } from '@modules/queue/services/message-publisher.service';
import { MODERATION_QUEUE } from '@modules/queue/queue.constants';
import { AuthenticatedUser } from '@modules/auth/interfaces/authenticated-user.interface';
import { CONTENT_BLOCKED } from '@common/constants/discussion.constants';
import { SendModerationError } from '@common/exceptions/discussion.exceptions';
import { describeError, errorStack } from '@common/utils/error.utils';
import { ServicesConfig } from '@config/services.config';
import {
  AutoModerationType,
  ContentType,
  FunctionalArea,
  ModerationCallback,
  ModerationContentItem,
  ModerationEvent,
  ModerationEventStatus,
} from './interfaces/moderation-event.interface';

export const AUTO_TEXT_TOXICITY_JOB = 'auto.text_toxicity';

export const moderationJobId = (event: ModerationEvent): string =>
  `${event.functional_area}-${event.content_id}`;

@Injectable()
export class ModerationEventPublisher {
  private readonly logger = new Logger(ModerationEventPublisher.name);
  private readonly serviceName: string;

  constructor(
    private readonly messagePublisher: MessagePublisherService,
    configService: ConfigService,
  ) {
    this.serviceName =
      configService.getOrThrow<ServicesConfig>('services').serviceName;
  }

  buildPostEvent(
    postId: number,
    text: string,
    user: AuthenticatedUser,
  ): ModerationEvent {
    return this.buildEvent(
      FunctionalArea.DISCUSSION_POST,
      postId,
      { name: 'post_content', value: text },
      this.rejectCallback('PUT', `/post/moderate/${postId}`, user),
      user,
    );
  }

  buildTopicEvent(
    topicId: number,
    title: string,
    user: AuthenticatedUser,
  ): ModerationEvent {
    return this.buildEvent(
      FunctionalArea.DISCUSSION_TOPIC,
      topicId,
      { name: 'topic_title', value: title },
      this.rejectCallback('DELETE', `/topic/moderate/${topicId}`, user),
      user,
    );
  }

  async sendPostToModeration(
    post: { id: number },
    text: string,
    user: AuthenticatedUser,
  ): Promise<string> {
    return this.send(this.buildPostEvent(post.id, text, user));
  }

  async sendTopicToModeration(
    topicId: number,
    title: string,
    user: AuthenticatedUser,
  ): Promise<string> {
    return this.send(this.buildTopicEvent(topicId, title, user));
  }

  private async send(event: ModerationEvent): Promise<string> {
    const jobId = moderationJobId(event);
    try {
      await this.messagePublisher.publish(MODERATION_QUEUE, {
        type: AUTO_TEXT_TOXICITY_JOB,
        data: event,
        // The job id makes a second publication of the same content a no-op
        options: { jobId, attempts: 1 },
      });
      this.logger.log(`Moderation event sent for ${jobId}`);
      return jobId;
    } catch (error) {
      this.logger.error(
        `Failed to send moderation event ${jobId}: ${describeError(error)}`,
        errorStack(error),
      );
      throw new SendModerationError(
        `Failed to send moderation event ${jobId}`,
      );
    }
  }

  private buildEvent(
    area: FunctionalArea,
    contentId: number,
    item: ModerationContentItem,
    rejectCallback: ModerationCallback,
    user: AuthenticatedUser,
  ): ModerationEvent {
    return {
      status: ModerationEventStatus.AUTO_PENDING,
      content_id: String(contentId),
      user_id: user.id,
      date: new Date().toISOString(),
      url: '',
      functional_area: area,
      content: { data_by_type: { [ContentType.TEXT]: [item] } },
      auto_mod_routing: [
        { moderation_type: AutoModerationType.TEXT_TOXICITY },
      ],
      reject_callbacks: [rejectCallback],
      accept_callbacks: [],
      history: [],
      transaction_id: uuidv4(),
    };
  }

  private rejectCallback(
    method: ModerationCallback['method'],
    url: string,
    user: AuthenticatedUser,
  ): ModerationCallback {
    return {
      service: this.serviceName,
      method,
      url,
      headers: { 'Content-Type': 'application/json' },
      payload: { text: CONTENT_BLOCKED, author_id: user.id },
    };
  }
}
