/**
 * HARI SDK Configuration
 */

import { z } from 'zod';
import { ConfigurationError } from './errors';
import { zodIssuesToMessages } from './schemas/bulk.zod';
import type { Logger } from './logger';

export const DEFAULT_BASE_URL = 'https://api.hari.quality-match.com';
export const DEFAULT_AUTH_URL = 'https://auth.quality-match.com/auth';
export const DEFAULT_CLIENT_ID = 'baked_beans_frontend';
export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Number of items sent per bulk request, per entity kind
 */
export interface UploaderBatchSizes {
  media: number;
  mediaObject: number;
  attribute: number;
}

/** Largest batch each bulk endpoint accepts */
export const BULK_UPLOAD_LIMITS: Readonly<UploaderBatchSizes> = {
  media: 500,
  mediaObject: 5000,
  attribute: 750,
};

export const DEFAULT_BATCH_SIZES: Readonly<UploaderBatchSizes> = {
  media: 30,
  mediaObject: 500,
  attribute: 500,
};

/** Unique attribute ids a single dataset may hold */
export const MAX_UNIQUE_ATTRIBUTES = 1000;

/**
 * Configuration for the HARI client
 */
export interface HariClientConfig {
  /** Base URL for the HARI API (default: https://api.hari.quality-match.com) */
  baseUrl?: string;
  /** Base URL of the auth server (default: https://auth.quality-match.com/auth) */
  authUrl?: string;
  /** OAuth client id (default: baked_beans_frontend) */
  clientId?: string;
  username: string;
  password: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Custom headers to include in all requests */
  headers?: Record<string, string>;
  /** Default batch sizes for uploaders created from this client */
  uploader?: Partial<UploaderBatchSizes>;
  logger?: Logger;
}

const batchSizesSchema = z.object({
  media: z.number().int().min(1).max(BULK_UPLOAD_LIMITS.media).default(DEFAULT_BATCH_SIZES.media),
  mediaObject: z
    .number()
    .int()
    .min(1)
    .max(BULK_UPLOAD_LIMITS.mediaObject)
    .default(DEFAULT_BATCH_SIZES.mediaObject),
  attribute: z
    .number()
    .int()
    .min(1)
    .max(BULK_UPLOAD_LIMITS.attribute)
    .default(DEFAULT_BATCH_SIZES.attribute),
});

/**
 * Fill in defaults and check every batch size against its endpoint ceiling
 */
export function resolveBatchSizes(overrides: Partial<UploaderBatchSizes> = {}): UploaderBatchSizes {
  const result = batchSizesSchema.safeParse(overrides);
  if (!result.success) {
    throw new ConfigurationError('Invalid uploader batch sizes', zodIssuesToMessages(result.error));
  }
  return result.data;
}

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  HARI_API_BASE_URL: z.string().url().optional(),
  HARI_AUTH_URL: z.string().url().optional(),
  HARI_CLIENT_ID: z.string().min(1).optional(),
  HARI_USERNAME: z.string().min(1),
  HARI_PASSWORD: z.string().min(1),
  HARI_TIMEOUT: positiveInt.optional(),
  HARI_UPLOADER__MEDIA_UPLOAD_BATCH_SIZE: positiveInt.optional(),
  HARI_UPLOADER__MEDIA_OBJECT_UPLOAD_BATCH_SIZE: positiveInt.optional(),
  HARI_UPLOADER__ATTRIBUTE_UPLOAD_BATCH_SIZE: positiveInt.optional(),
});

/**
 * Build a client configuration from `HARI_*` environment variables
 *
 * @example
 * ```typescript
 * const client = new HariClient(loadConfigFromEnv());
 * ```
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): HariClientConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid HARI environment configuration',
      zodIssuesToMessages(result.error)
    );
  }
  const vars = result.data;

  const uploader = resolveBatchSizes({
    media: vars.HARI_UPLOADER__MEDIA_UPLOAD_BATCH_SIZE,
    mediaObject: vars.HARI_UPLOADER__MEDIA_OBJECT_UPLOAD_BATCH_SIZE,
    attribute: vars.HARI_UPLOADER__ATTRIBUTE_UPLOAD_BATCH_SIZE,
  });

  return {
    baseUrl: vars.HARI_API_BASE_URL ?? DEFAULT_BASE_URL,
    authUrl: vars.HARI_AUTH_URL ?? DEFAULT_AUTH_URL,
    clientId: vars.HARI_CLIENT_ID ?? DEFAULT_CLIENT_ID,
    username: vars.HARI_USERNAME,
    password: vars.HARI_PASSWORD,
    timeout: vars.HARI_TIMEOUT ?? DEFAULT_TIMEOUT_MS,
    uploader,
  };
}
