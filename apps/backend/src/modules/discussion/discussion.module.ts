import { Module } from '@nestjs/common';
import { AuthModule } from '@modules/auth/auth.module';
import { AssetCategoryModule } from '@modules/asset-category/asset-category.module';
import { DiscourseModule } from '@modules/discourse/discourse.module';
import { ModerationModule } from '@modules/moderation/moderation.module';
import { NotificationModule } from '@modules/notification/notification.module';
import { CollaboratorsModule } from '@modules/collaborators/collaborators.module';
import { DiscussionController } from './discussion.controller';
import { DiscussionService } from './discussion.service';

@Module({
  imports: [
    AuthModule,
    AssetCategoryModule,
    DiscourseModule,
    ModerationModule,
    NotificationModule,
    CollaboratorsModule,
  ],
  controllers: [DiscussionController],
  providers: [DiscussionService],
})
export class DiscussionModule {}
