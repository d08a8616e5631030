import { Entity, Column, Index } from 'typeorm';
import { BaseEntity } from '../../../common/entities/base.entity';

/** Forum category provisioned for an asset. */
@Entity({ name: 'asset_categories' })
export class AssetCategory extends BaseEntity {
  @Column('uuid', { nullable: false })
  @Index('idx_asset_categories_asset_id', { unique: true })
  assetId!: string;

  @Column({ type: 'integer', nullable: false })
  categoryId!: number;

  @Column({ type: 'varchar', length: 2048, nullable: true })
  url!: string | null;
}
