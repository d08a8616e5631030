import { Injectable, Logger } from '@nestjs/common';
import { MessagePublisherService } from '@modules/queue/services/message-publisher.service';
import { NOTIFICATION_QUEUE } from '@modules/queue/queue.constants';
import { AuthServiceClient } from '@modules/collaborators/auth-service.client';
import { AssetServiceClient } from '@modules/collaborators/asset-service.client';
import { AuthenticatedUser } from '@modules/auth/interfaces/authenticated-user.interface';
import { GENERAL_POST_ASSET_ID } from '@common/constants/discussion.constants';
import { NotificationSendError } from '@common/exceptions/discussion.exceptions';
import { describeError, errorStack } from '@common/utils/error.utils';

export enum NotificationTemplate {
  GENERIC = 'generic',
  MODERATION_REJECTED = 'moderation_rejected',
}

export const SEND_EMAIL_JOB = 'send_email';

export interface NotificationRequest {
  template: NotificationTemplate;
  email: string;
  subject: string;
  message: string;
  user_id: string;
}

export interface NotificationRecipient {
  email: string;
  userId: string;
}

@Injectable()
export class NotificationService {
  private readonly logger = new Logger(NotificationService.name);

  constructor(
    private readonly messagePublisher: MessagePublisherService,
    private readonly authServiceClient: AuthServiceClient,
    private readonly assetServiceClient: AssetServiceClient,
  ) {}

  async sendEmail(request: NotificationRequest): Promise<void> {
    try {
      await this.messagePublisher.publish(NOTIFICATION_QUEUE, {
        type: SEND_EMAIL_JOB,
        data: request,
      });
      this.logger.log(
        `Queued '${request.subject}' email for user ${request.user_id}`,
      );
    } catch (error) {
      this.logger.error(
        `Failed to queue '${request.subject}' email: ${describeError(error)}`,
        errorStack(error),
      );
      throw new NotificationSendError(
        `Failed to queue '${request.subject}' email`,
      );
    }
  }

  /**
   * Topics on the general asset are standalone posts and confirm to their
   * author; any other topic is announced to the asset owner.
   */
  async notifyTopicCreated(
    assetId: string,
    title: string,
    user: AuthenticatedUser,
  ): Promise<void> {
    if (assetId.toLowerCase() === GENERAL_POST_ASSET_ID) {
      await this.sendEmail({
        template: NotificationTemplate.GENERIC,
        email: await this.emailOf(user),
        subject: 'New Post Created',
        message: `A new post '${title}' has been created.`,
        user_id: user.id,
      });
      return;
    }

    const asset = await this.assetServiceClient.getAsset(assetId);
    const ownerEmail = await this.authServiceClient.getMailFromUserId(
      asset.ownerId,
    );
    await this.sendEmail({
      template: NotificationTemplate.GENERIC,
      email: ownerEmail,
      subject: 'New Topic created for your asset',
      message: `A new topic '${title}' has been created for your asset '${asset.name}'`,
      user_id: user.id,
    });
  }

  async notifyPostRejected(
    recipient: NotificationRecipient,
    cooked: string,
  ): Promise<void> {
    await this.sendEmail({
      template: NotificationTemplate.MODERATION_REJECTED,
      email: recipient.email,
      subject: 'Post refused by moderation',
      message: `Post has been refused by the moderation: ${cooked}`,
      user_id: recipient.userId,
    });
  }

  async notifyTopicRejected(
    recipient: NotificationRecipient,
    title: string,
  ): Promise<void> {
    await this.sendEmail({
      template: NotificationTemplate.MODERATION_REJECTED,
      email: recipient.email,
      subject: 'Topic refused by moderation',
      message: `Topic has been refused by the moderation: ${title}`,
      user_id: recipient.userId,
    });
  }

  /** The author named by a reject callback, else the acting user. */
  async resolveRecipient(
    actingUser: AuthenticatedUser,
    authorId?: string,
  ): Promise<NotificationRecipient> {
    if (authorId && authorId !== actingUser.id) {
      return {
        email: await this.authServiceClient.getMailFromUserId(authorId),
        userId: authorId,
      };
    }
    return { email: await this.emailOf(actingUser), userId: actingUser.id };
  }

  private async emailOf(user: AuthenticatedUser): Promise<string> {
    return user.email ?? this.authServiceClient.getMailFromUserId(user.id);
  }
}
