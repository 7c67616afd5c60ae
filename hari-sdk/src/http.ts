/**
 * HARI SDK HTTP Client
 *
 * Wraps axios with HARI-specific configuration, bearer authentication,
 * and error handling.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { HariError, parseApiError } from './errors';
import type { TokenManager } from './auth';

export interface HttpClientConfig {
  /** Base URL for the HARI API */
  baseUrl: string;
  /** Supplies the bearer token for every request */
  tokens: TokenManager;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Custom headers to include in all requests */
  headers?: Record<string, string>;
}

export interface RequestOptions {
  /** Query parameters */
  params?: Record<string, unknown>;
  /** Request headers */
  headers?: Record<string, string>;
  /** Request timeout override */
  timeout?: number;
}

function parseRetryAfter(value: unknown): number | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) ? seconds : undefined;
}

/**
 * HTTP client for HARI API requests
 */
export class HttpClient {
  private readonly client: AxiosInstance;

  constructor(config: HttpClientConfig) {
    const { tokens } = config;

    this.client = axios.create({
      baseURL: config.baseUrl.replace(/\/$/, ''),
      timeout: config.timeout ?? 30000,
      headers: {
        'Content-Type': 'application/json',
        ...config.headers,
      },
    });

    this.client.interceptors.request.use(async (request) => {
      const token = await tokens.getToken();
      request.headers.set('Authorization', `Bearer ${token}`);
      return request;
    });

    // Response interceptor for error handling
    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        // Errors raised while authenticating are already typed
        if (error instanceof HariError) {
          throw error;
        }
        if (axios.isAxiosError(error) && error.response) {
          const { status, data, headers } = error.response;
          if (status === 401) {
            tokens.invalidate();
          }
          throw parseApiError(status, data, parseRetryAfter(headers['retry-after']));
        }
        const message = error instanceof Error ? error.message : 'Network error';
        throw new HariError(message, 'NETWORK_ERROR');
      }
    );
  }

  /**
   * Perform a GET request
   */
  async get<T = unknown>(path: string, options?: RequestOptions): Promise<T> {
    const response = await this.client.get<T>(path, this.buildConfig(options));
    return response.data;
  }

  /**
   * Perform a POST request
   */
  async post<T = unknown>(path: string, data?: unknown, options?: RequestOptions): Promise<T> {
    const response = await this.client.post<T>(path, data, this.buildConfig(options));
    return response.data;
  }

  /**
   * Build axios config from request options
   */
  private buildConfig(options?: RequestOptions): AxiosRequestConfig {
    if (!options) return {};

    return {
      params: options.params,
      headers: options.headers,
      timeout: options.timeout,
    };
  }
}
