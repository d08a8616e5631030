import { Agent } from 'https';
import { Method } from 'axios';

export interface ApiClientConfig {
  baseUrl: string;
  timeout?: number;
  httpsAgent?: Agent;
}

export interface ApiRequestOptions {
  data?: unknown;
  params?: Record<string, string | number | boolean>;
  headers?: Record<string, string>;
}

export interface ApiResponse<T> {
  data: T;
  status: number;
}

export interface ApiClient {
  request(
    method: Method,
    endpoint: string,
    options?: ApiRequestOptions,
  ): Promise<ApiResponse<unknown>>;
}
