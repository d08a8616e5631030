import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { AuthServiceClient } from './auth-service.client';
import { AssetServiceClient } from './asset-service.client';

@Module({
  imports: [HttpModule],
  providers: [AuthServiceClient, AssetServiceClient],
  exports: [AuthServiceClient, AssetServiceClient],
})
export class CollaboratorsModule {}
