import { Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { Method } from 'axios';
import { firstValueFrom } from 'rxjs';
import {
  ApiClient,
  ApiClientConfig,
  ApiRequestOptions,
  ApiResponse,
} from '../interfaces/api-client.interface';
import { describeError, errorStack } from '../utils/error.utils';

/**
 * JSON client over the Nest HttpService.
 *
 * Every status is handed back to the caller: subclasses decide what a
 * non-2xx answer means for their collaborator.
 */
export abstract class BaseApiClient implements ApiClient {
  protected readonly logger: Logger;

  constructor(protected readonly httpService: HttpService) {
    this.logger = new Logger(this.constructor.name);
  }

  protected abstract getConfig(): ApiClientConfig;

  async request(
    method: Method,
    endpoint: string,
    options: ApiRequestOptions = {},
  ): Promise<ApiResponse<unknown>> {
    const config = this.getConfig();
    const fullUrl = `${config.baseUrl}${endpoint}`;
    const verb = method.toUpperCase();

    try {
      const response = await firstValueFrom(
        this.httpService.request<unknown>({
          method,
          url: fullUrl,
          data: options.data,
          params: options.params,
          headers: options.headers,
          timeout: config.timeout,
          httpsAgent: config.httpsAgent,
          validateStatus: () => true,
        }),
      );

      this.logger.debug(`${verb} ${endpoint} returned ${response.status}`);

      return {
        data: response.data,
        status: response.status,
      };
    } catch (error) {
      this.logger.error(
        `API request failed for ${verb} ${fullUrl}: ${describeError(error)}`,
        errorStack(error),
      );
      throw error;
    }
  }
}
