import { DataSource } from 'typeorm';
import { ConfigService } from '@nestjs/config';
import { config } from 'dotenv';
import { SnakeNamingStrategy } from 'typeorm-naming-strategies';
import { AssetCategory } from '../modules/asset-category/entities/asset-category.entity';
import { CreateAssetCategoriesTable1760000000000 } from '../database/migrations/1760000000000-CreateAssetCategoriesTable';

// Load environment variables
config();

const configService = new ConfigService();

const AppDataSource = new DataSource({
  type: 'postgres',
  host: configService.get<string>('DB_HOST', 'localhost'),
  port: parseInt(configService.get<string>('DB_PORT', '5432'), 10),
  username: configService.get<string>('DB_USERNAME', 'postgres'),
  password: configService.get<string>('DB_PASSWORD', 'postgres'),
  database: configService.get<string>('DB_DATABASE', 'discussion'),

  entities: [AssetCategory],
  migrations: [CreateAssetCategoriesTable1760000000000],

  migrationsTableName: 'migrations',
  namingStrategy: new SnakeNamingStrategy(),

  logging:
    process.env.NODE_ENV !== 'production' ? ['query', 'error'] : ['error'],

  synchronize: false, // Keep false to use migrations
});

export default AppDataSource;
