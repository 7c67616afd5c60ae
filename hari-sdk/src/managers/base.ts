/**
 * Base Manager Class
 *
 * Provides common functionality for all resource managers.
 */

import type { HttpClient } from '../http';
import { BulkUploadSizeRangeError } from '../errors';
import { bulkResponseSchema, parseResponseModel } from '../schemas/bulk.zod';
import type { BulkResponse } from '../types';

export const DATASETS_PATH = '/datasets';

/**
 * Base class for all resource managers
 */
export abstract class BaseManager {
  protected readonly http: HttpClient;
  protected readonly basePath: string;

  constructor(http: HttpClient, basePath: string) {
    this.http = http;
    this.basePath = basePath;
  }

  /**
   * Build query parameters, filtering out undefined values
   */
  protected buildParams(params: object): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== null) {
        result[key] = value;
      }
    }
    return result;
  }

  /**
   * Build a path below a dataset of `basePath`, e.g. `/datasets/{id}/medias:bulk`
   */
  protected datasetPath(datasetId: string, suffix: string): string {
    return `${this.basePath}/${encodeURIComponent(datasetId)}/${suffix}`;
  }

  /**
   * POST a bulk payload after checking it against the endpoint's limit
   */
  protected async postBulk(path: string, items: readonly object[], limit: number): Promise<BulkResponse> {
    if (items.length > limit) {
      throw new BulkUploadSizeRangeError(limit, items.length);
    }
    const data = await this.http.post(path, items);
    return parseResponseModel(bulkResponseSchema, data, 'BulkResponse');
  }
}
