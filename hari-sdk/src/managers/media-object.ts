/**
 * Media Object Manager
 *
 * Manages media objects (geometries annotated on a media).
 */

import { z } from 'zod';
import { BaseManager, DATASETS_PATH } from './base';
import type { HttpClient } from '../http';
import { BULK_UPLOAD_LIMITS } from '../config';
import { mediaObjectResponseSchema, parseResponseModel } from '../schemas/bulk.zod';
import type {
  BulkMediaObjectCreate,
  BulkResponse,
  ListEntitiesParams,
  MediaObjectResponse,
} from '../types';

const mediaObjectListSchema = z.array(mediaObjectResponseSchema);

/**
 * Manager for media object operations
 */
export class MediaObjectManager extends BaseManager {
  constructor(http: HttpClient) {
    super(http, DATASETS_PATH);
  }

  /**
   * Create up to 5000 media objects in one request
   */
  async createMany(
    datasetId: string,
    mediaObjects: readonly BulkMediaObjectCreate[]
  ): Promise<BulkResponse> {
    return this.postBulk(
      this.datasetPath(datasetId, 'mediaObjects:bulk'),
      mediaObjects,
      BULK_UPLOAD_LIMITS.mediaObject
    );
  }

  async list(datasetId: string, params: ListEntitiesParams = {}): Promise<MediaObjectResponse[]> {
    const data = await this.http.get(this.datasetPath(datasetId, 'mediaObjects'), {
      params: this.buildParams(params),
    });
    return parseResponseModel(mediaObjectListSchema, data, 'MediaObjectResponse[]');
  }
}
