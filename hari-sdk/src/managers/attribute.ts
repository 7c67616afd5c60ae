/**
 * Attribute Manager
 */

import { z } from 'zod';
import { BaseManager, DATASETS_PATH } from './base';
import type { HttpClient } from '../http';
import { BULK_UPLOAD_LIMITS } from '../config';
import { attributeMetadataResponseSchema, parseResponseModel } from '../schemas/bulk.zod';
import type { AttributeMetadataResponse, BulkAttributeCreate, BulkResponse } from '../types';

const attributeMetadataListSchema = z.array(attributeMetadataResponseSchema);

/**
 * Manager for attribute operations
 */
export class AttributeManager extends BaseManager {
  constructor(http: HttpClient) {
    super(http, DATASETS_PATH);
  }

  /**
   * Create up to 750 attributes in one request.
   *
   * The endpoint answers 409 when some attributes already exist; the
   * resulting ConflictError carries the bulk response as its `body`.
   */
  async createMany(
    datasetId: string,
    attributes: readonly BulkAttributeCreate[]
  ): Promise<BulkResponse> {
    return this.postBulk(
      this.datasetPath(datasetId, 'attributes:bulk'),
      attributes,
      BULK_UPLOAD_LIMITS.attribute
    );
  }

  /**
   * List one metadata entry per attribute id of a dataset
   */
  async listMetadata(datasetId: string): Promise<AttributeMetadataResponse[]> {
    const data = await this.http.get(this.datasetPath(datasetId, 'attributeMetadata'));
    return parseResponseModel(attributeMetadataListSchema, data, 'AttributeMetadataResponse[]');
  }
}
