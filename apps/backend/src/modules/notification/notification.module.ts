import { Module } from '@nestjs/common';
import { QueueModule } from '@modules/queue/queue.module';
import { CollaboratorsModule } from '@modules/collaborators/collaborators.module';
import { NotificationService } from './notification.service';

@Module({
  imports: [QueueModule, CollaboratorsModule],
  providers: [NotificationService],
  exports: [NotificationService],
})
export class NotificationModule {}
