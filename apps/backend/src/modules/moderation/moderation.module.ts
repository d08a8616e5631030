import { Module } from '@nestjs/common';
import { QueueModule } from '@modules/queue/queue.module';
import { ModerationEventPublisher } from './moderation-event.publisher';

@Module({
  imports: [QueueModule],
  providers: [ModerationEventPublisher],
  exports: [ModerationEventPublisher],
})
export class ModerationModule {}
