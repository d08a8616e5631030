import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { z } from 'zod';
import { describeError } from '@common/utils/error.utils';
import { AssetCategory } from './entities/asset-category.entity';

const PgErrorSchema = z.object({ code: z.string() });

// SQLSTATE class 23: unique, foreign key, not null and check violations
export function isIntegrityViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const parsed = PgErrorSchema.safeParse(error.driverError);
  return parsed.success && parsed.data.code.startsWith('23');
}

@Injectable()
export class AssetCategoryService {
  private readonly logger = new Logger(AssetCategoryService.name);

  constructor(
    @InjectRepository(AssetCategory)
    private readonly assetCategoryRepository: Repository<AssetCategory>,
  ) {}

  async lookup(assetId: string): Promise<number | null> {
    const rows = await this.assetCategoryRepository.find({
      where: { assetId },
      order: { createdAt: 'ASC' },
    });
    return rows.length > 0 ? rows[0].categoryId : null;
  }

  /**
   * Remembers the category of an asset. Returns false when another row
   * already claimed the asset.
   */
  async store(
    assetId: string,
    categoryId: number,
    url: string | null = null,
  ): Promise<boolean> {
    try {
      await this.assetCategoryRepository.insert({ assetId, categoryId, url });
      this.logger.log(`Stored category ${categoryId} for asset ${assetId}`);
      return true;
    } catch (error) {
      if (isIntegrityViolation(error)) {
        this.logger.warn(
          `Category ${categoryId} not stored for asset ${assetId}: ${describeError(error)}`,
        );
        return false;
      }
      throw error;
    }
  }
}
