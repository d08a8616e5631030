import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bull';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MODERATION_QUEUE, NOTIFICATION_QUEUE } from './queue.constants';
import { MessagePublisherService } from './services/message-publisher.service';

@Module({
  imports: [
    BullModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        redis: {
          host: configService.get<string>('REDIS_HOST', 'localhost'),
          port: parseInt(configService.get<string>('REDIS_PORT', '6379'), 10),
          maxRetriesPerRequest: 3,
          enableReadyCheck: false,
        },
        defaultJobOptions: {
          removeOnComplete: 500,
          removeOnFail: 100,
        },
      }),
    }),
    BullModule.registerQueue(
      { name: MODERATION_QUEUE },
      { name: NOTIFICATION_QUEUE },
    ),
  ],
  providers: [MessagePublisherService],
  exports: [MessagePublisherService],
})
export class QueueModule {}
