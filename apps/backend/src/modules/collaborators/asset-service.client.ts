import { Injectable } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { BaseApiClient } from '@common/services/base-api-client.service';
import {
  ApiClientConfig,
  ApiResponse,
} from '@common/interfaces/api-client.interface';
import {
  AssetRetrievalError,
  CollaboratorError,
} from '@common/exceptions/discussion.exceptions';
import { ASSET_ERROR_CODE } from '@common/constants/discussion.constants';
import { describeError, parsePayload } from '@common/utils/error.utils';
import { ServicesConfig } from '@config/services.config';
import { AssetResponseSchema, AssetSummary } from './collaborators.schemas';

@Injectable()
export class AssetServiceClient extends BaseApiClient {
  private readonly baseUrl: string;

  constructor(httpService: HttpService, configService: ConfigService) {
    super(httpService);
    this.baseUrl =
      configService.getOrThrow<ServicesConfig>('services').assetServiceUrl;
  }

  protected getConfig(): ApiClientConfig {
    return { baseUrl: this.baseUrl };
  }

  async getAsset(assetId: string): Promise<AssetSummary> {
    let response: ApiResponse<unknown>;
    try {
      response = await this.request('get', `/${assetId}`);
    } catch (error) {
      throw new CollaboratorError(
        `Could not call asset service: ${describeError(error)}`,
        ASSET_ERROR_CODE,
      );
    }

    if (response.status !== 200 && response.status !== 201) {
      this.logger.error(`Failed to get asset ${assetId}: ${response.status}`);
      throw new AssetRetrievalError(
        `Asset service answered ${response.status}`,
      );
    }

    const asset = parsePayload(AssetResponseSchema, response.data, (error) => {
      this.logger.error(`Unexpected asset payload: ${error.message}`);
      return new AssetRetrievalError(`Malformed asset ${assetId}`);
    });
    return {
      ownerId: asset.data.public.despUserId,
      name: asset.data.public.name,
    };
  }
}
