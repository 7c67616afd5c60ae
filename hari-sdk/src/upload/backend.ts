/**
 * Upload Backend
 *
 * The calls HariUploader makes against a dataset. HariClient provides the
 * HTTP implementation; tests substitute an in-memory one.
 */

import type {
  AttributeManager,
  MediaManager,
  MediaObjectManager,
  SubsetManager,
} from '../managers';
import type {
  AttributeMetadataResponse,
  BulkAttributeCreate,
  BulkMediaCreate,
  BulkMediaObjectCreate,
  BulkResponse,
  SubsetResponse,
  SubsetType,
} from '../types';
import type { ExistingEntity } from './duplicates';

export type BulkCreateRequest =
  | { kind: 'media'; items: BulkMediaCreate[] }
  | { kind: 'media_object'; items: BulkMediaObjectCreate[] }
  | { kind: 'attribute'; items: BulkAttributeCreate[] };

export type ListableKind = 'media' | 'media_object';

export interface CreateSubsetRequest {
  subsetType: SubsetType;
  name: string;
  objectCategory: boolean;
}

export interface UploadBackend {
  /** Send one bulk request; must report a correlation id per item */
  createEntities(datasetId: string, request: BulkCreateRequest): Promise<BulkResponse>;
  listEntities(datasetId: string, kind: ListableKind): Promise<ExistingEntity[]>;
  listSubsets(datasetId: string): Promise<SubsetResponse[]>;
  /** Returns the id of the created subset */
  createSubset(datasetId: string, request: CreateSubsetRequest): Promise<string>;
  listAttributeMetadata(datasetId: string): Promise<AttributeMetadataResponse[]>;
}

export interface UploadManagers {
  medias: MediaManager;
  mediaObjects: MediaObjectManager;
  attributes: AttributeManager;
  subsets: SubsetManager;
}

/**
 * UploadBackend over the REST resource managers
 */
export class ManagerUploadBackend implements UploadBackend {
  constructor(private readonly managers: UploadManagers) {}

  async createEntities(datasetId: string, request: BulkCreateRequest): Promise<BulkResponse> {
    switch (request.kind) {
      case 'media':
        return this.managers.medias.createMany(datasetId, request.items);
      case 'media_object':
        return this.managers.mediaObjects.createMany(datasetId, request.items);
      case 'attribute':
        return this.managers.attributes.createMany(datasetId, request.items);
    }
  }

  async listEntities(datasetId: string, kind: ListableKind): Promise<ExistingEntity[]> {
    if (kind === 'media') {
      return this.managers.medias.list(datasetId, { archived: false });
    }
    return this.managers.mediaObjects.list(datasetId, { archived: false });
  }

  async listSubsets(datasetId: string): Promise<SubsetResponse[]> {
    return this.managers.subsets.list(datasetId);
  }

  async createSubset(datasetId: string, request: CreateSubsetRequest): Promise<string> {
    return this.managers.subsets.createEmpty(datasetId, {
      subset_type: request.subsetType,
      subset_name: request.name,
      object_category: request.objectCategory,
    });
  }

  async listAttributeMetadata(datasetId: string): Promise<AttributeMetadataResponse[]> {
    return this.managers.attributes.listMetadata(datasetId);
  }
}
