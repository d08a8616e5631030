import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AssetCategory } from './entities/asset-category.entity';
import { AssetCategoryService } from './asset-category.service';

@Module({
  imports: [TypeOrmModule.forFeature([AssetCategory])],
  providers: [AssetCategoryService],
  exports: [AssetCategoryService],
})
export class AssetCategoryModule {}
