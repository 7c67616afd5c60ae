/**
 * Subset Manager
 *
 * Subsets are named groupings of medias or media objects inside a dataset.
 * Object categories are media object subsets flagged `object_category`.
 */

import { z } from 'zod';
import { BaseManager, DATASETS_PATH } from './base';
import type { HttpClient } from '../http';
import {
  parseResponseModel,
  subsetIdResponseSchema,
  subsetResponseSchema,
} from '../schemas/bulk.zod';
import type { CreateEmptySubsetParams, SubsetResponse } from '../types';

const subsetListSchema = z.array(subsetResponseSchema);

const SUBSETS_PATH = '/subsets';

/**
 * Manager for subset operations
 */
export class SubsetManager extends BaseManager {
  constructor(http: HttpClient) {
    super(http, DATASETS_PATH);
  }

  /**
   * List the subsets of a dataset
   */
  async list(datasetId: string): Promise<SubsetResponse[]> {
    const data = await this.http.get(this.datasetPath(datasetId, 'subsets'));
    return parseResponseModel(subsetListSchema, data, 'SubsetResponse[]');
  }

  /**
   * Create an empty subset and return its id
   */
  async createEmpty(datasetId: string, params: CreateEmptySubsetParams): Promise<string> {
    const data = await this.http.post(
      SUBSETS_PATH,
      {},
      {
        params: this.buildParams({
          dataset_id: datasetId,
          subset_type: params.subset_type,
          subset_name: params.subset_name,
          object_category: params.object_category ?? false,
        }),
      }
    );
    return parseResponseModel(subsetIdResponseSchema, data, 'SubsetId');
  }
}
