/**
 * Media Manager
 *
 * Manages medias (images, videos, point clouds) of a dataset.
 */

import { z } from 'zod';
import { BaseManager, DATASETS_PATH } from './base';
import type { HttpClient } from '../http';
import { BULK_UPLOAD_LIMITS } from '../config';
import { mediaResponseSchema, parseResponseModel } from '../schemas/bulk.zod';
import type { BulkMediaCreate, BulkResponse, ListEntitiesParams, MediaResponse } from '../types';

const mediaListSchema = z.array(mediaResponseSchema);

/**
 * Manager for media operations
 */
export class MediaManager extends BaseManager {
  constructor(http: HttpClient) {
    super(http, DATASETS_PATH);
  }

  /**
   * Create up to 500 medias in one request
   */
  async createMany(datasetId: string, medias: readonly BulkMediaCreate[]): Promise<BulkResponse> {
    return this.postBulk(this.datasetPath(datasetId, 'medias:bulk'), medias, BULK_UPLOAD_LIMITS.media);
  }

  /**
   * List the medias of a dataset
   */
  async list(datasetId: string, params: ListEntitiesParams = {}): Promise<MediaResponse[]> {
    const data = await this.http.get(this.datasetPath(datasetId, 'medias'), {
      params: this.buildParams(params),
    });
    return parseResponseModel(mediaListSchema, data, 'MediaResponse[]');
  }
}
