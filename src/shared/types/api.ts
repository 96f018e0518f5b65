/**
 * Shared API-related type definitions
 */

import type { AxiosRequestConfig, AxiosResponse } from 'axios';

/**
 * HTTP client configuration
 */
export interface HttpClientConfig {
  baseURL: string;
  timeout: number;
  headers?: Record<string, string>;
}

/**
 * The slice of an axios instance the HTTP client relies on
 */
export interface HttpTransport {
  request(config: AxiosRequestConfig): Promise<Pick<AxiosResponse, 'status' | 'data'>>;
}

/**
 * Per-request options
 */
export interface RequestOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}
