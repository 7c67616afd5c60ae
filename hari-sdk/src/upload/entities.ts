/**
 * Upload Entities
 *
 * In-memory trees of medias, media objects and attributes queued for upload.
 * Content fields belong to the caller. The `upload` and `target` records are
 * written by HariUploader while it runs and are never set at construction.
 *
 * Every attribute and media object belongs to at most one owner. Adding one
 * that already has an owner adds a copy, so server ids written for one owner
 * never leak into another.
 */

import { consoleLogger, type Logger } from '../logger';
import type {
  AnnotatableType,
  AttributeGroup,
  AttributeType,
  AttributeValue,
  BulkAttributeCreate,
  BulkMediaCreate,
  BulkMediaObjectCreate,
  DataSource,
  Geometry,
  MediaType,
} from '../types';

// =============================================================================
// Server-assigned state
// =============================================================================

export interface UploadState {
  /** Server id, from a fresh upload or from duplicate detection */
  id: string | null;
  /** True when the entity already exists on the server and is skipped */
  uploaded: boolean;
  /** Correlates the request item with its bulk response item */
  bulkOperationAnnotatableId: string | null;
}

export interface MediaObjectUploadState extends UploadState {
  /** Server id of the parent media */
  mediaId: string | null;
}

export interface AttributeTarget {
  annotatableId: string | null;
  annotatableType: AnnotatableType | null;
}

function emptyUploadState(): UploadState {
  return { id: null, uploaded: false, bulkOperationAnnotatableId: null };
}

// =============================================================================
// Attribute
// =============================================================================

export interface HariAttributeInit {
  /** Reuse an existing attribute id; assigned during upload when omitted */
  id?: string;
  name: string;
  value: AttributeValue;
  attribute_type?: AttributeType;
  attribute_group?: AttributeGroup;
  question?: string;
}

export class HariAttribute {
  id: string | null;
  readonly name: string;
  readonly value: AttributeValue;
  readonly attribute_type: AttributeType | null;
  readonly attribute_group: AttributeGroup | null;
  readonly question: string | null;
  readonly target: AttributeTarget = { annotatableId: null, annotatableType: null };
  private owner: object | null = null;

  constructor(init: HariAttributeInit) {
    this.id = init.id ?? null;
    this.name = init.name;
    this.value = init.value;
    this.attribute_type = init.attribute_type ?? null;
    this.attribute_group = init.attribute_group ?? null;
    this.question = init.question ?? null;
  }

  /**
   * Bind this attribute to `owner`, or return an unbound copy bound to it
   * when another owner already holds this one
   */
  adoptBy(owner: object): HariAttribute {
    const attribute = this.owner === null ? this : this.copy();
    attribute.owner = owner;
    return attribute;
  }

  copy(): HariAttribute {
    return new HariAttribute({
      id: this.id ?? undefined,
      name: this.name,
      value: this.value,
      attribute_type: this.attribute_type ?? undefined,
      attribute_group: this.attribute_group ?? undefined,
      question: this.question ?? undefined,
    });
  }

  toPayload(): BulkAttributeCreate {
    return {
      id: this.id,
      name: this.name,
      value: this.value,
      annotatable_id: this.target.annotatableId,
      annotatable_type: this.target.annotatableType,
      attribute_type: this.attribute_type,
      attribute_group: this.attribute_group,
      question: this.question,
    };
  }
}

// =============================================================================
// Media object
// =============================================================================

export interface HariMediaObjectInit {
  back_reference: string;
  source?: DataSource;
  reference_data?: Geometry;
  subset_ids?: string[];
  frame_idx?: number;
  instance_id?: string;
  archived?: boolean;
  /** Object category label, resolved to a subset id during upload */
  object_category_subset_name?: string;
}

export class HariMediaObject {
  readonly back_reference: string;
  readonly source: DataSource;
  readonly reference_data: Geometry | null;
  readonly frame_idx: number | null;
  readonly instance_id: string | null;
  readonly archived: boolean;
  subset_ids: string[];
  object_category_subset_name: string | null;
  /** Subset id of the resolved object category */
  object_category: string | null = null;
  private readonly ownAttributes: HariAttribute[] = [];
  readonly upload: MediaObjectUploadState = { ...emptyUploadState(), mediaId: null };
  private readonly init: HariMediaObjectInit;
  private readonly logger: Logger;
  private owner: object | null = null;

  constructor(init: HariMediaObjectInit, logger: Logger = consoleLogger) {
    if (!init.back_reference) {
      logger.warn(
        'Detected empty back_reference in HariMediaObject. Use a back_reference so ' +
          'that you can match HARI objects to your own.'
      );
    }
    this.init = init;
    this.logger = logger;
    this.back_reference = init.back_reference;
    this.source = init.source ?? 'REFERENCE';
    this.reference_data = init.reference_data ?? null;
    this.subset_ids = [...(init.subset_ids ?? [])];
    this.frame_idx = init.frame_idx ?? null;
    this.instance_id = init.instance_id ?? null;
    this.archived = init.archived ?? false;
    this.object_category_subset_name = init.object_category_subset_name ?? null;
  }

  get attributes(): readonly HariAttribute[] {
    return this.ownAttributes;
  }

  addAttribute(...attributes: HariAttribute[]): void {
    for (const attribute of attributes) {
      this.ownAttributes.push(attribute.adoptBy(this));
    }
  }

  /**
   * Bind this media object to `owner`, or return a copy bound to it when
   * another media already holds this one
   */
  adoptBy(owner: object): HariMediaObject {
    const mediaObject = this.owner === null ? this : this.copy();
    mediaObject.owner = owner;
    return mediaObject;
  }

  /**
   * Copy the content fields and attributes, without any upload state
   */
  copy(): HariMediaObject {
    const mediaObject = new HariMediaObject(
      {
        ...this.init,
        subset_ids: [...this.subset_ids],
        object_category_subset_name: this.object_category_subset_name ?? undefined,
      },
      this.logger
    );
    for (const attribute of this.attributes) {
      mediaObject.ownAttributes.push(attribute.copy().adoptBy(mediaObject));
    }
    return mediaObject;
  }

  setObjectCategorySubsetName(name: string): void {
    this.object_category_subset_name = name;
  }

  toPayload(): BulkMediaObjectCreate {
    return {
      media_id: this.upload.mediaId,
      back_reference: this.back_reference,
      source: this.source,
      reference_data: this.reference_data,
      object_category: this.object_category,
      subset_ids: this.subset_ids.length > 0 ? [...this.subset_ids] : null,
      frame_idx: this.frame_idx,
      instance_id: this.instance_id,
      archived: this.archived,
      bulk_operation_annotatable_id: this.upload.bulkOperationAnnotatableId,
    };
  }
}

// =============================================================================
// Media
// =============================================================================

export interface HariMediaInit {
  name: string;
  media_type: MediaType;
  back_reference: string;
  /** Local file location, kept for the caller and never sent */
  file_path?: string;
  media_url?: string;
  archived?: boolean;
  subset_ids?: string[];
  metadata?: Record<string, unknown>;
  frame_idx?: number;
  frame_timestamp?: string;
  back_reference_json?: string;
}

export class HariMedia {
  readonly name: string;
  readonly media_type: MediaType;
  readonly back_reference: string;
  readonly file_path: string | null;
  readonly media_url: string | null;
  readonly archived: boolean;
  readonly metadata: Record<string, unknown> | null;
  readonly frame_idx: number | null;
  readonly frame_timestamp: string | null;
  readonly back_reference_json: string | null;
  subset_ids: string[];
  private readonly ownMediaObjects: HariMediaObject[] = [];
  private readonly ownAttributes: HariAttribute[] = [];
  readonly upload: UploadState = emptyUploadState();

  constructor(init: HariMediaInit, logger: Logger = consoleLogger) {
    if (!init.back_reference) {
      logger.warn(
        'Detected empty back_reference in HariMedia. Use a back_reference so ' +
          'that you can match HARI objects to your own.'
      );
    }
    this.name = init.name;
    this.media_type = init.media_type;
    this.back_reference = init.back_reference;
    this.file_path = init.file_path ?? null;
    this.media_url = init.media_url ?? null;
    this.archived = init.archived ?? false;
    this.subset_ids = [...(init.subset_ids ?? [])];
    this.metadata = init.metadata ?? null;
    this.frame_idx = init.frame_idx ?? null;
    this.frame_timestamp = init.frame_timestamp ?? null;
    this.back_reference_json = init.back_reference_json ?? null;
  }

  get media_objects(): readonly HariMediaObject[] {
    return this.ownMediaObjects;
  }

  get attributes(): readonly HariAttribute[] {
    return this.ownAttributes;
  }

  /**
   * Add media objects. One already added to a media is added as a copy.
   */
  addMediaObject(...mediaObjects: HariMediaObject[]): void {
    for (const mediaObject of mediaObjects) {
      this.ownMediaObjects.push(mediaObject.adoptBy(this));
    }
  }

  /**
   * Add attributes. One already added to a media or media object is added as a copy.
   */
  addAttribute(...attributes: HariAttribute[]): void {
    for (const attribute of attributes) {
      this.ownAttributes.push(attribute.adoptBy(this));
    }
  }

  toPayload(): BulkMediaCreate {
    return {
      name: this.name,
      media_type: this.media_type,
      back_reference: this.back_reference,
      media_url: this.media_url,
      archived: this.archived,
      subset_ids: this.subset_ids.length > 0 ? [...this.subset_ids] : null,
      metadata: this.metadata,
      frame_idx: this.frame_idx,
      frame_timestamp: this.frame_timestamp,
      back_reference_json: this.back_reference_json,
      bulk_operation_annotatable_id: this.upload.bulkOperationAnnotatableId,
    };
  }
}

/**
 * Anything that goes through the media or media object bulk endpoint
 */
export type Annotatable = HariMedia | HariMediaObject;
