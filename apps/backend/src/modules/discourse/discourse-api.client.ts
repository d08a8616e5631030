import { Injectable } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { Method } from 'axios';
import { Agent } from 'https';
import { ZodTypeAny, z } from 'zod';
import { BaseApiClient } from '@common/services/base-api-client.service';
import {
  ApiClientConfig,
  ApiResponse,
} from '@common/interfaces/api-client.interface';
import {
  DiscourseAuthenticationError,
  DiscourseRequestError,
  DiscourseResourceUnavailableError,
  DiscourseUnavailableError,
} from '@common/exceptions/discussion.exceptions';
import { describeError, parsePayload } from '@common/utils/error.utils';
import { DiscourseConfig } from '@config/discourse.config';
import { extractErrors } from './discourse.schemas';

export interface DiscourseCallOptions {
  /** Acting forum user, the system user when omitted. */
  username?: string;
  data?: unknown;
  params?: Record<string, string | number | boolean>;
  /** Client-facing message when the forum answers 404. */
  notFoundMessage?: string;
}

@Injectable()
export class DiscourseApiClient extends BaseApiClient {
  private readonly discourse: DiscourseConfig;
  private readonly httpsAgent?: Agent;

  constructor(httpService: HttpService, configService: ConfigService) {
    super(httpService);
    this.discourse = configService.getOrThrow<DiscourseConfig>('discourse');
    if (!this.discourse.sslCheck) {
      this.httpsAgent = new Agent({ rejectUnauthorized: false });
    }
  }

  get host(): string {
    return this.discourse.host.replace(/\/+$/, '');
  }

  protected getConfig(): ApiClientConfig {
    return {
      baseUrl: this.host,
      httpsAgent: this.httpsAgent,
    };
  }

  /**
   * Performs a forum call and classifies its status. Resolves with the raw
   * payload of a 2xx answer only.
   */
  async call(
    method: Method,
    endpoint: string,
    operation: string,
    options: DiscourseCallOptions = {},
  ): Promise<unknown> {
    let response: ApiResponse<unknown>;
    try {
      response = await this.request(method, endpoint, {
        data: options.data,
        params: options.params,
        headers: this.headers(options.username),
      });
    } catch (error) {
      throw new DiscourseUnavailableError(
        `Forum unreachable during ${operation}: ${describeError(error)}`,
      );
    }

    this.classify(response.status, response.data, operation, options);
    return response.data;
  }

  decode<S extends ZodTypeAny>(
    schema: S,
    payload: unknown,
    operation: string,
  ): z.output<S> {
    return parsePayload(schema, payload, (error) => {
      this.logger.error(
        `Unexpected payload during ${operation}: ${error.message}`,
      );
      return new DiscourseUnavailableError(
        `Malformed forum payload during ${operation}`,
      );
    });
  }

  private headers(username?: string): Record<string, string> {
    return {
      'Api-Key': this.discourse.apiKey,
      'Api-Username': username ?? this.discourse.systemUsername,
      Accept: 'application/json',
    };
  }

  private classify(
    status: number,
    payload: unknown,
    operation: string,
    options: DiscourseCallOptions,
  ): void {
    if (status >= 200 && status < 300) {
      return;
    }

    if (status >= 500) {
      this.logger.error(`Forum failed with ${status} during ${operation}`);
      throw new DiscourseUnavailableError(
        `Forum failed with ${status} during ${operation}`,
      );
    }

    if (status === 404) {
      this.logger.warn(`Resource not found during ${operation}`);
      throw new DiscourseResourceUnavailableError(
        `Resource not found during ${operation}`,
        options.notFoundMessage,
      );
    }

    if (status === 403) {
      this.logger.error(
        `Authentication refused by ${this.host} during ${operation}`,
      );
      throw new DiscourseAuthenticationError(
        `Failed to authenticate on discourse during ${operation}`,
      );
    }

    if (status >= 400) {
      const errors = extractErrors(payload);
      const fallback =
        status === 429
          ? `Too many requests during ${operation}`
          : `Provided parameters are not matching expectation during ${operation}`;
      this.logger.error(
        `Forum rejected ${operation} with ${status}: ${errors?.join('-') ?? fallback}`,
      );
      throw new DiscourseRequestError(
        errors && errors.length > 0 ? errors.join('-') : fallback,
      );
    }

    this.logger.error(`Unexpected status ${status} during ${operation}`);
    throw new DiscourseUnavailableError(
      `Unexpected status ${status} during ${operation}`,
    );
  }
}
