/**
 * HARI Uploader
 *
 * Uploads trees of medias, media objects and attributes through the bulk
 * endpoints. Medias are uploaded in batches; after each media batch its media
 * objects and then all of its attributes follow, so that every child can be
 * sent with the server id of its parent.
 */

import { MAX_UNIQUE_ATTRIBUTES, resolveBatchSizes, type UploaderBatchSizes } from '../config';
import {
  ConflictError,
  MediaObjectUploadError,
  MediaUploadError,
  UniqueAttributesLimitExceededError,
} from '../errors';
import { consoleLogger, type Logger } from '../logger';
import { bulkConflictResponseSchema } from '../schemas/bulk.zod';
import type {
  AnnotatableType,
  AttributeMetadataResponse,
  BulkItemResponse,
  BulkResponse,
  EntityKind,
} from '../types';
import { validateAttributes } from './attribute-validation';
import type { UploadBackend } from './backend';
import { chunk } from './batching';
import { markDuplicates } from './duplicates';
import type { Annotatable, HariAttribute, HariMedia, HariMediaObject } from './entities';
import { emptyBulkResponse, mergeBulkResponses } from './merge';
import { resolveObjectCategories } from './object-categories';

export type UploaderState =
  | 'idle'
  | 'validating'
  | 'duplicate_checking'
  | 'category_resolving'
  | 'uploading'
  | 'merging'
  | 'done'
  | 'failed';

export interface UploadProgress {
  tier: EntityKind;
  /** Items of this tier handled so far, skipped ones included */
  processed: number;
  total: number;
}

export interface HariUploaderOptions {
  datasetId: string;
  /** Object category labels to ensure subsets for, in addition to the referenced ones */
  objectCategories?: Iterable<string>;
  /**
   * Skip medias whose back_reference already exists in the dataset.
   * Costs one listing of all medias (default: true).
   */
  checkDuplicateMedias?: boolean;
  /**
   * Skip media objects whose back_reference already exists in the dataset.
   * Costs one listing of all media objects (default: true).
   */
  checkDuplicateMediaObjects?: boolean;
  batchSizes?: Partial<UploaderBatchSizes>;
  logger?: Logger;
  onProgress?: (progress: UploadProgress) => void;
}

export interface HariUploadResults {
  medias: BulkResponse;
  media_objects: BulkResponse;
  attributes: BulkResponse;
}

interface TierResponses {
  medias: BulkResponse[];
  media_objects: BulkResponse[];
  attributes: BulkResponse[];
}

type Counters = Record<EntityKind, UploadProgress>;

const ENTITY_LABEL: Record<'media' | 'media_object', string> = {
  media: 'media',
  media_object: 'media object',
};

const ENTITY_TITLE: Record<'media' | 'media_object', string> = {
  media: 'Media',
  media_object: 'MediaObject',
};

function hasChildren(entity: Annotatable): boolean {
  if ('media_objects' in entity && entity.media_objects.length > 0) return true;
  return entity.attributes.length > 0;
}

function attributeKey(annotatableType: AnnotatableType | null, name: string): string {
  return `${annotatableType ?? ''}\u0000${name}`;
}

/**
 * Batching uploader for one dataset
 *
 * @example
 * ```typescript
 * const uploader = client.createUploader({ datasetId, objectCategories: ['car'] });
 *
 * const media = new HariMedia({
 *   name: 'frame 1',
 *   media_type: 'image',
 *   back_reference: 'frame-1',
 *   media_url: 'https://storage.example.com/frame-1.jpg',
 * });
 * const car = new HariMediaObject({
 *   back_reference: 'frame-1/car-1',
 *   reference_data: { type: 'point2d_xy', x: 40, y: 12 },
 * });
 * car.setObjectCategorySubsetName('car');
 * media.addMediaObject(car);
 *
 * uploader.addMedia(media);
 * const results = await uploader.upload();
 * ```
 */
export class HariUploader {
  private readonly backend: UploadBackend;
  private readonly datasetId: string;
  private readonly objectCategories: Set<string>;
  private readonly checkDuplicateMedias: boolean;
  private readonly checkDuplicateMediaObjects: boolean;
  private readonly batchSizes: UploaderBatchSizes;
  private readonly logger: Logger;
  private readonly onProgress?: (progress: UploadProgress) => void;

  private readonly medias: HariMedia[] = [];
  private readonly queuedMedias = new Set<HariMedia>();
  private readonly mediaBackReferences = new Set<string>();
  private readonly mediaObjectBackReferences = new Set<string>();
  private currentState: UploaderState = 'idle';

  constructor(backend: UploadBackend, options: HariUploaderOptions) {
    this.backend = backend;
    this.datasetId = options.datasetId;
    this.objectCategories = new Set(options.objectCategories ?? []);
    this.checkDuplicateMedias = options.checkDuplicateMedias ?? true;
    this.checkDuplicateMediaObjects = options.checkDuplicateMediaObjects ?? true;
    this.batchSizes = resolveBatchSizes(options.batchSizes);
    this.logger = options.logger ?? consoleLogger;
    this.onProgress = options.onProgress;
  }

  get state(): UploaderState {
    return this.currentState;
  }

  /**
   * Queue medias, with their media objects and attributes, for upload
   */
  addMedia(...medias: HariMedia[]): void {
    for (const media of medias) {
      if (this.queuedMedias.has(media)) {
        this.logger.warn(`Media ${media.back_reference} was already added; ignoring it.`);
        continue;
      }
      this.queuedMedias.add(media);

      if (this.mediaBackReferences.has(media.back_reference)) {
        this.logger.warn(
          `Found duplicate media back_reference: ${media.back_reference}. If you want to be able ` +
            'to match HARI objects 1:1 to your own, consider using unique back_references.'
        );
      } else {
        this.mediaBackReferences.add(media.back_reference);
      }

      for (const mediaObject of media.media_objects) {
        if (this.mediaObjectBackReferences.has(mediaObject.back_reference)) {
          this.logger.warn(
            `Found duplicate media_object back_reference: ${mediaObject.back_reference}. If you want ` +
              'to be able to match HARI objects 1:1 to your own, consider using unique back_references.'
          );
        } else {
          this.mediaObjectBackReferences.add(mediaObject.back_reference);
        }
      }

      this.medias.push(media);
    }
  }

  /**
   * Run the upload. Returns null when no media was added.
   *
   * Validation, category and media or media object upload errors abort the
   * run. A 409 from the attribute endpoint is reported in the attribute
   * results instead.
   */
  async upload(): Promise<HariUploadResults | null> {
    if (this.medias.length === 0) {
      this.logger.info(
        'No medias to upload. Add them with HariUploader.addMedia() before calling HariUploader.upload().'
      );
      return null;
    }

    try {
      const results = await this.run();
      this.currentState = 'done';
      return results;
    } catch (error) {
      this.currentState = 'failed';
      throw error;
    }
  }

  private async run(): Promise<HariUploadResults> {
    this.currentState = 'validating';
    const mediaObjects = this.medias.flatMap((media) => media.media_objects);
    const attributes = this.collectAttributes();
    validateAttributes(attributes);
    await this.assignAttributeIds(attributes);

    this.currentState = 'duplicate_checking';
    if (this.checkDuplicateMedias) {
      const existing = await this.backend.listEntities(this.datasetId, 'media');
      markDuplicates(this.medias, existing, this.logger);
    }
    if (this.checkDuplicateMediaObjects && mediaObjects.length > 0) {
      const existing = await this.backend.listEntities(this.datasetId, 'media_object');
      markDuplicates(mediaObjects, existing, this.logger);
    }

    this.currentState = 'category_resolving';
    await resolveObjectCategories(
      this.backend,
      this.datasetId,
      this.medias,
      this.objectCategories,
      this.logger
    );

    this.currentState = 'uploading';
    this.logger.info(
      `Starting upload of ${this.medias.length} medias with ${mediaObjects.length} media_objects ` +
        `and ${attributes.length} attributes to HARI. Only not already uploaded values will be uploaded.`
    );

    const counters: Counters = {
      media: { tier: 'media', processed: 0, total: this.medias.length },
      media_object: { tier: 'media_object', processed: 0, total: mediaObjects.length },
      attribute: { tier: 'attribute', processed: 0, total: attributes.length },
    };
    const responses: TierResponses = { medias: [], media_objects: [], attributes: [] };

    for (const batch of chunk(this.medias, this.batchSizes.media)) {
      await this.uploadMediaBatch(batch, responses, counters);
    }

    this.currentState = 'merging';
    const results: HariUploadResults = {
      medias: mergeBulkResponses(...responses.medias),
      media_objects: mergeBulkResponses(...responses.media_objects),
      attributes: mergeBulkResponses(...responses.attributes),
    };
    this.logger.info('Finished upload to HARI.', {
      medias: results.medias.summary,
      media_objects: results.media_objects.summary,
      attributes: results.attributes.summary,
    });
    return results;
  }

  // ===========================================================================
  // Attributes
  // ===========================================================================

  /**
   * Flatten all attributes and stamp each with the type of its owner
   */
  private collectAttributes(): HariAttribute[] {
    const attributes: HariAttribute[] = [];
    for (const media of this.medias) {
      for (const attribute of media.attributes) {
        attribute.target.annotatableType = 'Media';
        attributes.push(attribute);
      }
      for (const mediaObject of media.media_objects) {
        for (const attribute of mediaObject.attributes) {
          attribute.target.annotatableType = 'MediaObject';
          attributes.push(attribute);
        }
      }
    }
    return attributes;
  }

  /**
   * Give attributes without an id the id already used for their name and
   * annotatable type: by another queued attribute, else by the dataset, else a
   * new one. Then check the dataset's unique attribute limit.
   */
  private async assignAttributeIds(attributes: readonly HariAttribute[]): Promise<void> {
    if (attributes.length === 0) return;

    const metadata = await this.backend.listAttributeMetadata(this.datasetId);
    const ids = new Map<string, string>();
    for (const attribute of attributes) {
      if (attribute.id !== null) {
        ids.set(attributeKey(attribute.target.annotatableType, attribute.name), attribute.id);
      }
    }

    const existingByKey = new Map<string, string>();
    const existingByName = new Map<string, string>();
    for (const entry of metadata) {
      if (entry.annotatable_type) {
        existingByKey.set(attributeKey(entry.annotatable_type, entry.name), entry.id);
      } else {
        existingByName.set(entry.name, entry.id);
      }
    }

    for (const attribute of attributes) {
      if (attribute.id !== null) continue;
      const key = attributeKey(attribute.target.annotatableType, attribute.name);
      let id = ids.get(key) ?? existingByKey.get(key) ?? existingByName.get(attribute.name);
      if (id === undefined) {
        id = crypto.randomUUID();
      }
      ids.set(key, id);
      attribute.id = id;
    }

    this.checkUniqueAttributeLimit(attributes, metadata);
  }

  private checkUniqueAttributeLimit(
    attributes: readonly HariAttribute[],
    metadata: readonly AttributeMetadataResponse[]
  ): void {
    const existingIds = new Set(metadata.map((entry) => entry.id));
    const intendedIds = new Set(existingIds);
    for (const attribute of attributes) {
      if (attribute.id !== null) intendedIds.add(attribute.id);
    }
    if (intendedIds.size > MAX_UNIQUE_ATTRIBUTES) {
      throw new UniqueAttributesLimitExceededError(
        MAX_UNIQUE_ATTRIBUTES,
        intendedIds.size - existingIds.size,
        existingIds.size,
        intendedIds.size
      );
    }
  }

  // ===========================================================================
  // Batches
  // ===========================================================================

  private async uploadMediaBatch(
    medias: HariMedia[],
    responses: TierResponses,
    counters: Counters
  ): Promise<void> {
    const response = await this.createAnnotatables('media', medias, (batch) =>
      this.backend.createEntities(this.datasetId, {
        kind: 'media',
        items: batch.map((media) => media.toPayload()),
      })
    );
    responses.medias.push(response);
    this.reportProgress(counters.media, medias.length);

    const resolved = this.matchResults(medias, response, 'media');
    for (const media of medias) {
      const mediaId = resolved.get(media);
      if (mediaId === undefined) continue;
      for (const mediaObject of media.media_objects) {
        mediaObject.upload.mediaId = mediaId;
      }
      for (const attribute of media.attributes) {
        attribute.target.annotatableId = mediaId;
        attribute.target.annotatableType = 'Media';
      }
    }

    const mediaObjects = medias.flatMap((media) => media.media_objects);
    for (const batch of chunk(mediaObjects, this.batchSizes.mediaObject)) {
      responses.media_objects.push(await this.uploadMediaObjectBatch(batch));
      this.reportProgress(counters.media_object, batch.length);
    }

    const attributes = [
      ...medias.flatMap((media) => media.attributes),
      ...mediaObjects.flatMap((mediaObject) => mediaObject.attributes),
    ];
    for (const batch of chunk(attributes, this.batchSizes.attribute)) {
      responses.attributes.push(await this.uploadAttributeBatch(batch));
      this.reportProgress(counters.attribute, batch.length);
    }
  }

  private async uploadMediaObjectBatch(mediaObjects: HariMediaObject[]): Promise<BulkResponse> {
    const response = await this.createAnnotatables('media_object', mediaObjects, (batch) =>
      this.backend.createEntities(this.datasetId, {
        kind: 'media_object',
        items: batch.map((mediaObject) => mediaObject.toPayload()),
      })
    );

    const resolved = this.matchResults(mediaObjects, response, 'media_object');
    for (const mediaObject of mediaObjects) {
      const mediaObjectId = resolved.get(mediaObject);
      if (mediaObjectId === undefined) continue;
      for (const attribute of mediaObject.attributes) {
        attribute.target.annotatableId = mediaObjectId;
        attribute.target.annotatableType = 'MediaObject';
      }
    }
    return response;
  }

  /**
   * Attribute conflicts are expected when attributes are uploaded again, so a
   * 409 carrying a bulk response counts as that batch's result.
   */
  private async uploadAttributeBatch(attributes: HariAttribute[]): Promise<BulkResponse> {
    try {
      return await this.backend.createEntities(this.datasetId, {
        kind: 'attribute',
        items: attributes.map((attribute) => attribute.toPayload()),
      });
    } catch (error) {
      if (error instanceof ConflictError) {
        const parsed = bulkConflictResponseSchema.safeParse(error.body);
        if (parsed.success) {
          this.logger.warn('Attribute upload reported conflicts.', {
            failed: parsed.data.summary.failed,
          });
          return parsed.data;
        }
      }
      throw error;
    }
  }

  /**
   * Assign correlation ids, send the entities not marked as uploaded, and add
   * a `conflict` result for each skipped one.
   */
  private async createAnnotatables<T extends Annotatable>(
    kind: 'media' | 'media_object',
    entities: T[],
    send: (batch: T[]) => Promise<BulkResponse>
  ): Promise<BulkResponse> {
    for (const entity of entities) {
      entity.upload.bulkOperationAnnotatableId ??= crypto.randomUUID();
    }

    const pending = entities.filter((entity) => !entity.upload.uploaded);
    const skipped = entities.filter((entity) => entity.upload.uploaded);
    const response = pending.length > 0 ? await send(pending) : emptyBulkResponse();
    if (skipped.length === 0) return response;

    const label = ENTITY_LABEL[kind];
    const skippedResults: BulkItemResponse[] = skipped.map((entity) => ({
      bulk_operation_annotatable_id: entity.upload.bulkOperationAnnotatableId,
      status: 'conflict',
      item_id: entity.upload.id,
      errors: [
        `Skipped the upload of ${label} ${String(entity.upload.id)} since ${label} with back ` +
          `reference ${entity.back_reference} already exists.`,
      ],
    }));

    return {
      status: response.status,
      summary: {
        total: response.summary.total + skipped.length,
        successful: response.summary.successful + skipped.length,
        failed: response.summary.failed,
      },
      results: [...response.results, ...skippedResults],
    };
  }

  /**
   * Match entities to their response items by correlation id and record the
   * server ids. Entities with children must have exactly one response item.
   */
  private matchResults<T extends Annotatable>(
    entities: readonly T[],
    response: BulkResponse,
    kind: 'media' | 'media_object'
  ): Map<T, string | null> {
    const byCorrelationId = new Map<string, BulkItemResponse[]>();
    for (const result of response.results) {
      const correlationId = result.bulk_operation_annotatable_id;
      if (!correlationId) continue;
      const matches = byCorrelationId.get(correlationId);
      if (matches) {
        matches.push(result);
      } else {
        byCorrelationId.set(correlationId, [result]);
      }
    }

    const resolved = new Map<T, string | null>();
    for (const entity of entities) {
      const correlationId = entity.upload.bulkOperationAnnotatableId ?? '';
      const matches = byCorrelationId.get(correlationId) ?? [];
      const needsId = hasChildren(entity);

      if (matches.length !== 1) {
        if (!needsId) continue;
        const message =
          matches.length === 0
            ? `${ENTITY_TITLE[kind]} upload response doesn't match expectation. Couldn't find ` +
              `bulk_operation_annotatable_id=${correlationId} in the upload response.`
            : `${ENTITY_TITLE[kind]} upload response contains multiple items for ` +
              `bulk_operation_annotatable_id=${correlationId}.`;
        throw kind === 'media' ? new MediaUploadError(message) : new MediaObjectUploadError(message);
      }

      const itemId = matches[0].item_id ?? null;
      if (!entity.upload.uploaded) {
        entity.upload.id = itemId;
      }
      if (itemId === null && needsId) {
        this.logger.warn(`No id was returned for ${ENTITY_LABEL[kind]} ${entity.back_reference}.`, {
          status: matches[0].status,
          errors: matches[0].errors,
        });
      }
      resolved.set(entity, itemId);
    }
    return resolved;
  }

  private reportProgress(counter: UploadProgress, handled: number): void {
    counter.processed += handled;
    this.onProgress?.({ ...counter });
  }
}
