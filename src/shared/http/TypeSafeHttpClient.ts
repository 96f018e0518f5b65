/**
 * Type-safe HTTP client with Zod validation
 * Every failure leaves this class as a FetchError
 */

import axios, { AxiosRequestConfig, AxiosResponse } from 'axios';
import * as crypto from 'crypto';
import { z } from 'zod';
import { logger } from '../../lib/logger';
import { FetchError } from '../errors';
import { HttpClientConfig, HttpTransport, RequestOptions } from '../types/api';

type HttpMethod = 'GET' | 'POST';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Type-safe HTTP client with runtime validation.
 * Requests are made once; callers decide what a failure means.
 */
export class TypeSafeHttpClient {
  private readonly client: HttpTransport;
  private readonly config: HttpClientConfig;

  constructor(config: HttpClientConfig, transport?: HttpTransport) {
    this.config = config;
    this.client =
      transport ??
      axios.create({
        baseURL: config.baseURL,
        timeout: config.timeout,
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
        },
      });
  }

  /**
   * Make a GET request with type validation
   */
  async get<T>(endpoint: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: RequestOptions): Promise<T> {
    return this.request('GET', endpoint, schema, undefined, options);
  }

  /**
   * Make a POST request with type validation
   */
  async post<T>(
    endpoint: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    data?: unknown,
    options?: RequestOptions
  ): Promise<T> {
    return this.request('POST', endpoint, schema, data, options);
  }

  private async request<T>(
    method: HttpMethod,
    endpoint: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    data: unknown,
    options: RequestOptions = {}
  ): Promise<T> {
    const correlationId = crypto.randomUUID();
    const url = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;

    logger.debug({ correlationId, method, url, baseURL: this.config.baseURL }, 'Making HTTP request');

    const requestConfig: AxiosRequestConfig = {
      method,
      url,
      baseURL: this.config.baseURL,
      timeout: this.config.timeout,
      headers: { ...this.config.headers, ...options.headers },
      signal: options.signal,
    };
    if (data !== undefined) {
      requestConfig.data = data;
    }

    let response: Pick<AxiosResponse, 'status' | 'data'>;
    try {
      response = await this.client.request(requestConfig);
    } catch (error) {
      const fetchError = this.toFetchError(error, url, correlationId);
      logger.warn(
        { correlationId, method, url, reason: fetchError.reason, status: fetchError.responseStatus },
        'HTTP request failed'
      );
      throw fetchError;
    }

    return this.validateResponse(response, schema, url, correlationId);
  }

  /**
   * Validate response data with Zod schema
   */
  private validateResponse<T>(
    response: Pick<AxiosResponse, 'status' | 'data'>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    url: string,
    correlationId: string
  ): T {
    const result = schema.safeParse(response.data);
    if (result.success) {
      logger.debug({ correlationId, status: response.status }, 'Response validated successfully');
      return result.data;
    }

    logger.error(
      { correlationId, status: response.status, url, issues: result.error.issues },
      'Response validation failed'
    );
    throw FetchError.invalidResponse(
      result.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; '),
      url,
      { correlationId }
    );
  }

  /**
   * Convert an axios failure into a FetchError
   */
  private toFetchError(error: unknown, url: string, correlationId: string): FetchError {
    const context = { correlationId, metadata: { baseURL: this.config.baseURL } };

    if (axios.isCancel(error)) {
      return FetchError.cancelled(url, context);
    }

    if (axios.isAxiosError(error)) {
      if (error.response) {
        return FetchError.httpStatus(error.response.status, url, context, error);
      }
      if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
        return FetchError.timeout(url, this.config.timeout, context, error);
      }
      if (error.code === 'ERR_CANCELED') {
        return FetchError.cancelled(url, context, error);
      }
      return FetchError.network(error.message, url, context, error);
    }

    const cause = error instanceof Error ? error : new Error(String(error));
    return FetchError.network(cause.message, url, context, cause);
  }
}
