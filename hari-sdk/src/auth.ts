/**
 * HARI SDK Authentication
 *
 * Obtains OAuth access tokens with the password grant and caches them until
 * shortly before they expire.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { AuthenticationError, HariError, parseApiError } from './errors';
import { parseResponseModel } from './schemas/bulk.zod';
import { consoleLogger, type Logger } from './logger';

export interface TokenManagerConfig {
  /** Base URL of the auth server */
  authUrl: string;
  clientId: string;
  username: string;
  password: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  logger?: Logger;
  /** Millisecond clock, replaceable in tests */
  now?: () => number;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
});

/** Tokens are treated as expired this long before the server says so */
const EXPIRY_BUFFER_MS = 1000;

/**
 * Token manager for the HARI auth server
 */
export class TokenManager {
  private readonly client: AxiosInstance;
  private readonly config: TokenManagerConfig;
  private readonly logger: Logger;
  private readonly now: () => number;

  private accessToken: string | null = null;
  private expiresAt = 0;
  private pending: Promise<string> | null = null;

  constructor(config: TokenManagerConfig) {
    if (!config.username || !config.password) {
      throw new AuthenticationError('Username and password are required');
    }
    this.config = config;
    this.logger = config.logger ?? consoleLogger;
    this.now = config.now ?? Date.now;
    this.client = axios.create({
      baseURL: config.authUrl.replace(/\/$/, ''),
      timeout: config.timeout ?? 30000,
    });
  }

  /**
   * Return a valid access token, fetching a new one when none is cached or
   * the cached one has expired. Concurrent callers share one refresh.
   */
  async getToken(): Promise<string> {
    if (this.accessToken !== null && this.now() < this.expiresAt) {
      return this.accessToken;
    }
    if (!this.pending) {
      this.pending = this.fetchToken().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  /**
   * Drop the cached token so the next request authenticates again
   */
  invalidate(): void {
    this.accessToken = null;
    this.expiresAt = 0;
  }

  private async fetchToken(): Promise<string> {
    const form = new URLSearchParams({
      grant_type: 'password',
      client_id: this.config.clientId,
      username: this.config.username,
      password: this.config.password,
    });

    let data: unknown;
    try {
      const response = await this.client.post<unknown>(
        '/realms/BBQ/protocol/openid-connect/token',
        form
      );
      data = response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        if (error.response.status === 401) {
          this.logger.error('Authentication error: Invalid username or password.');
          throw new AuthenticationError('Invalid username or password');
        }
        throw parseApiError(error.response.status, error.response.data);
      }
      const message = error instanceof Error ? error.message : 'Network error';
      throw new HariError(message, 'NETWORK_ERROR');
    }

    const token = parseResponseModel(tokenResponseSchema, data, 'TokenResponse');
    this.accessToken = token.access_token;
    this.expiresAt = this.now() + token.expires_in * 1000 - EXPIRY_BUFFER_MS;
    this.logger.debug('Obtained HARI access token', { expiresIn: token.expires_in });
    return token.access_token;
  }
}
