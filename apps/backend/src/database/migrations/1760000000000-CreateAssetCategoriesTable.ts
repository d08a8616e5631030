import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateAssetCategoriesTable1760000000000
  implements MigrationInterface
{
  name = 'CreateAssetCategoriesTable1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "asset_categories" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "asset_id" uuid NOT NULL,
        "category_id" integer NOT NULL,
        "url" varchar(2048),
        "created_at" TIMESTAMP NOT NULL DEFAULT now(),
        "updated_at" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_asset_categories" PRIMARY KEY ("id")
      )
    `);

    // One category per asset
    await queryRunner.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS "idx_asset_categories_asset_id" ON "asset_categories" ("asset_id")
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `DROP INDEX IF EXISTS "idx_asset_categories_asset_id"`,
    );
    await queryRunner.query(`DROP TABLE IF EXISTS "asset_categories"`);
  }
}
