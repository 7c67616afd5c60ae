/**
 * HARI Client
 *
 * Main entry point for the HARI SDK.
 * Provides a unified interface to the HARI resources the uploader works with.
 */

import { HttpClient } from './http';
import { TokenManager } from './auth';
import {
  DEFAULT_AUTH_URL,
  DEFAULT_BASE_URL,
  DEFAULT_CLIENT_ID,
  DEFAULT_TIMEOUT_MS,
  type HariClientConfig,
  type UploaderBatchSizes,
} from './config';
import { consoleLogger, type Logger } from './logger';
import { AttributeManager, MediaManager, MediaObjectManager, SubsetManager } from './managers';
import { ManagerUploadBackend, type UploadBackend } from './upload/backend';
import { HariUploader, type HariUploaderOptions } from './upload/uploader';

/**
 * HARI Client
 *
 * @example
 * ```typescript
 * import { HariClient, loadConfigFromEnv } from 'hari-sdk';
 *
 * const client = new HariClient(loadConfigFromEnv());
 *
 * // List what a dataset already holds
 * const existing = await client.medias.list(datasetId);
 * console.log(`${existing.length} medias in dataset`);
 *
 * // Upload a tree of medias, media objects and attributes
 * const uploader = client.createUploader({ datasetId });
 * uploader.addMedia(media);
 * const results = await uploader.upload();
 * ```
 */
export class HariClient {
  private readonly http: HttpClient;
  private readonly tokens: TokenManager;
  private readonly logger: Logger;
  private readonly uploaderBatchSizes: Partial<UploaderBatchSizes>;

  /** Media operations */
  public readonly medias: MediaManager;

  /** Media object operations */
  public readonly mediaObjects: MediaObjectManager;

  /** Attribute and attribute metadata operations */
  public readonly attributes: AttributeManager;

  /** Subset (including object category) operations */
  public readonly subsets: SubsetManager;

  constructor(config: HariClientConfig) {
    this.logger = config.logger ?? consoleLogger;
    this.uploaderBatchSizes = config.uploader ?? {};
    const timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;

    this.tokens = new TokenManager({
      authUrl: config.authUrl ?? DEFAULT_AUTH_URL,
      clientId: config.clientId ?? DEFAULT_CLIENT_ID,
      username: config.username,
      password: config.password,
      timeout,
      logger: this.logger,
    });

    this.http = new HttpClient({
      baseUrl: config.baseUrl ?? DEFAULT_BASE_URL,
      tokens: this.tokens,
      timeout,
      headers: config.headers,
    });

    this.medias = new MediaManager(this.http);
    this.mediaObjects = new MediaObjectManager(this.http);
    this.attributes = new AttributeManager(this.http);
    this.subsets = new SubsetManager(this.http);
  }

  /**
   * The upload backend served by this client's managers
   */
  uploadBackend(): UploadBackend {
    return new ManagerUploadBackend({
      medias: this.medias,
      mediaObjects: this.mediaObjects,
      attributes: this.attributes,
      subsets: this.subsets,
    });
  }

  /**
   * Create an uploader for one dataset. Batch sizes default to the client's
   * `uploader` configuration.
   */
  createUploader(options: HariUploaderOptions): HariUploader {
    return new HariUploader(this.uploadBackend(), {
      logger: this.logger,
      ...options,
      batchSizes: { ...this.uploaderBatchSizes, ...options.batchSizes },
    });
  }
}
