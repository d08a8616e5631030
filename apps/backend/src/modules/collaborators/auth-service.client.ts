import { Injectable } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { BaseApiClient } from '@common/services/base-api-client.service';
import { ApiClientConfig } from '@common/interfaces/api-client.interface';
import {
  AuthenticationNeededError,
  CollaboratorError,
  DiscussionError,
} from '@common/exceptions/discussion.exceptions';
import { AUTH_ERROR_CODE } from '@common/constants/discussion.constants';
import { describeError, errorStack, parsePayload } from '@common/utils/error.utils';
import { Role, parseRoles } from '@modules/access/enums/role.enum';
import { ServicesConfig } from '@config/services.config';
import {
  CurrentProfileResponseSchema,
  ProfileResponseSchema,
} from './collaborators.schemas';

/** Client of the identity service that owns user profiles and roles. */
@Injectable()
export class AuthServiceClient extends BaseApiClient {
  private readonly baseUrl: string;

  constructor(httpService: HttpService, configService: ConfigService) {
    super(httpService);
    this.baseUrl =
      configService.getOrThrow<ServicesConfig>('services').authServiceUrl;
  }

  protected getConfig(): ApiClientConfig {
    return { baseUrl: this.baseUrl };
  }

  async getMailFromUserId(userId: string): Promise<string> {
    try {
      const response = await this.request('get', `/profile/${userId}`);
      if (response.status !== 200) {
        this.logger.error(
          `Profile of user ${userId} answered ${response.status}`,
        );
      }
      const profile = parsePayload(
        ProfileResponseSchema,
        response.data,
        (error) => new Error(`Unexpected profile payload: ${error.message}`),
      );
      return profile.data.profile.email;
    } catch (error) {
      this.logger.error(
        `Exception while contacting auth service: ${describeError(error)}`,
        errorStack(error),
      );
      throw new CollaboratorError(
        `Could not call auth service: ${describeError(error)}`,
        AUTH_ERROR_CODE,
      );
    }
  }

  /** Roles of the caller, resolved with the caller's own credentials. */
  async getCurrentUserRoles(authorization: string | undefined): Promise<Role[]> {
    if (!authorization) {
      throw new AuthenticationNeededError('User is not logged in');
    }

    try {
      const response = await this.request('get', '/profile', {
        headers: { Authorization: authorization },
      });
      if (response.status === 401) {
        this.logger.warn('Auth service reports the caller as logged out');
        throw new AuthenticationNeededError('User is not logged in');
      }
      if (response.status !== 200) {
        throw new Error(`Auth service answered ${response.status}`);
      }
      const profile = parsePayload(
        CurrentProfileResponseSchema,
        response.data,
        (error) => new Error(`Unexpected profile payload: ${error.message}`),
      );
      return parseRoles(profile.data.roles);
    } catch (error) {
      if (error instanceof DiscussionError) {
        throw error;
      }
      this.logger.error(
        `Failed to get current user roles: ${describeError(error)}`,
        errorStack(error),
      );
      throw new CollaboratorError(
        `Failed to get current user roles: ${describeError(error)}`,
        AUTH_ERROR_CODE,
      );
    }
  }
}
