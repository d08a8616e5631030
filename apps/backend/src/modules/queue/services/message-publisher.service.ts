import { Injectable, Logger } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bull';
import { JobOptions, Queue } from 'bull';
import { describeError, errorStack } from '@common/utils/error.utils';
import {
  MODERATION_QUEUE,
  NOTIFICATION_QUEUE,
  OutboundQueue,
} from '../queue.constants';

export interface OutboundMessage<T> {
  type: string;
  data: T;
  options?: JobOptions;
}

/**
 * Hands messages to the queues consumed by the moderation and notification
 * subsystems. Nothing in this service processes them.
 */
@Injectable()
export class MessagePublisherService {
  private readonly logger = new Logger(MessagePublisherService.name);
  private readonly queues: Record<OutboundQueue, Queue>;

  constructor(
    @InjectQueue(MODERATION_QUEUE) moderationQueue: Queue,
    @InjectQueue(NOTIFICATION_QUEUE) notificationQueue: Queue,
  ) {
    this.queues = {
      [MODERATION_QUEUE]: moderationQueue,
      [NOTIFICATION_QUEUE]: notificationQueue,
    };
  }

  /** Resolves with the id the queue gave the job. */
  async publish<T>(
    queueName: OutboundQueue,
    message: OutboundMessage<T>,
  ): Promise<string> {
    this.logger.debug(`Publishing ${message.type} to ${queueName}`);
    try {
      const job = await this.queues[queueName].add(
        message.type,
        message.data,
        message.options,
      );
      this.logger.log(
        `Published ${message.type} to ${queueName}, job ID: ${job.id}`,
      );
      return job.id.toString();
    } catch (error) {
      this.logger.error(
        `Failed to publish ${message.type} to ${queueName}: ${describeError(error)}`,
        errorStack(error),
      );
      throw error;
    }
  }
}
