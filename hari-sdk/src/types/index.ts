/**
 * HARI SDK Types
 *
 * Request payloads are written by hand; response types are inferred from the
 * zod schemas that validate them.
 */

import type { z } from 'zod';
import type {
  bulkItemResponseSchema,
  bulkUploadSummarySchema,
  bulkResponseSchema,
  mediaResponseSchema,
  mediaObjectResponseSchema,
  subsetResponseSchema,
  attributeMetadataResponseSchema,
} from '../schemas/bulk.zod';
import type {
  AnnotatableType,
  AttributeGroup,
  AttributeType,
  AttributeValue,
  DataSource,
  MediaType,
  SubsetType,
} from './common';
import type { Geometry } from './geometry';

export * from './common';
export * from './geometry';

// =============================================================================
// Responses
// =============================================================================

export type BulkItemResponse = z.infer<typeof bulkItemResponseSchema>;
export type BulkUploadSummary = z.infer<typeof bulkUploadSummarySchema>;
export type BulkResponse = z.infer<typeof bulkResponseSchema>;
export type MediaResponse = z.infer<typeof mediaResponseSchema>;
export type MediaObjectResponse = z.infer<typeof mediaObjectResponseSchema>;
export type SubsetResponse = z.infer<typeof subsetResponseSchema>;
export type AttributeMetadataResponse = z.infer<typeof attributeMetadataResponseSchema>;

// =============================================================================
// Bulk create payloads
// =============================================================================

/**
 * One item of `POST /datasets/{id}/medias:bulk`
 */
export interface BulkMediaCreate {
  name: string;
  media_type: MediaType;
  back_reference: string;
  media_url?: string | null;
  archived: boolean;
  subset_ids?: string[] | null;
  metadata?: Record<string, unknown> | null;
  frame_idx?: number | null;
  frame_timestamp?: string | null;
  back_reference_json?: string | null;
  /** Correlates this item with its entry in the bulk response */
  bulk_operation_annotatable_id: string | null;
}

/**
 * One item of `POST /datasets/{id}/mediaObjects:bulk`
 */
export interface BulkMediaObjectCreate {
  media_id: string | null;
  back_reference: string;
  source: DataSource;
  reference_data?: Geometry | null;
  object_category?: string | null;
  subset_ids?: string[] | null;
  frame_idx?: number | null;
  instance_id?: string | null;
  archived: boolean;
  bulk_operation_annotatable_id: string | null;
}

/**
 * One item of `POST /datasets/{id}/attributes:bulk`
 */
export interface BulkAttributeCreate {
  id: string | null;
  name: string;
  value: AttributeValue;
  annotatable_id: string | null;
  annotatable_type: AnnotatableType | null;
  attribute_type?: AttributeType | null;
  attribute_group?: AttributeGroup | null;
  question?: string | null;
}

// =============================================================================
// Listing parameters
// =============================================================================

/**
 * Query parameters for the media and media object listings
 */
export interface ListEntitiesParams {
  archived?: boolean;
  limit?: number;
  skip?: number;
}

/**
 * Parameters of `POST /subsets`
 */
export interface CreateEmptySubsetParams {
  subset_type: SubsetType;
  subset_name: string;
  object_category?: boolean;
}
