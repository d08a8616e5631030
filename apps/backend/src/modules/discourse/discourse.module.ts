import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { AssetCategoryModule } from '@modules/asset-category/asset-category.module';
import { DiscourseApiClient } from './discourse-api.client';
import { DiscourseService } from './discourse.service';

@Module({
  imports: [HttpModule, AssetCategoryModule],
  providers: [DiscourseApiClient, DiscourseService],
  exports: [DiscourseService],
})
export class DiscourseModule {}
