/**
 * Common Types
 *
 * Enumerations shared by the request models, the response schemas and the
 * uploader. Tuples are exported next to their unions so the zod schemas can
 * validate against the same list of values.
 */

// =============================================================================
// Bulk operations
// =============================================================================

export const BULK_OPERATION_STATUSES = ['success', 'partial_success', 'failure', 'processing'] as const;

/**
 * Overall status of a bulk request.
 */
export type BulkOperationStatus = (typeof BULK_OPERATION_STATUSES)[number];

export const RESPONSE_STATES = [
  'success',
  'conflict',
  'failure',
  'missing_data',
  'server_error',
  'bad_data',
] as const;

/**
 * Status of a single item inside a bulk response.
 */
export type ResponseState = (typeof RESPONSE_STATES)[number];

// =============================================================================
// Annotatables
// =============================================================================

export type MediaType = 'image' | 'video' | 'point_cloud';

/**
 * `REFERENCE` for geometries provided by the dataset owner, `QM` for
 * geometries produced by annotation.
 */
export type DataSource = 'QM' | 'REFERENCE';

export const ANNOTATABLE_TYPES = ['Media', 'MediaObject'] as const;

/**
 * Kind of entity an attribute is attached to.
 */
export type AnnotatableType = (typeof ANNOTATABLE_TYPES)[number];

export type SubsetType = 'media' | 'media_object' | 'instance' | 'attribute';

export type AttributeType = 'Binary' | 'Categorical' | 'Slider' | 'Text';

export type AttributeGroup =
  | 'annotation_attribute'
  | 'ml_annotation_attribute'
  | 'auto_attribute'
  | 'initial_attribute'
  | 'inherited_annotation_attribute';

// =============================================================================
// Attribute values
// =============================================================================

export type AttributeScalar = number | boolean | string | null;

/**
 * An attribute value is a scalar or a list of scalars. Lists are expected to
 * be homogeneous; the uploader rejects mixed element types before upload.
 */
export type AttributeValue = AttributeScalar | AttributeScalar[];

/**
 * Value classification used for consistency checks. Booleans are never
 * classified as numbers.
 */
export type ValueClassification = 'number' | 'bool' | 'str' | 'list' | 'null';

/**
 * Entity kinds served by the bulk endpoints.
 */
export type EntityKind = 'media' | 'media_object' | 'attribute';
