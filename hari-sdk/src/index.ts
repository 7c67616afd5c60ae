/**
 * HARI SDK
 *
 * TypeScript SDK for the HARI media annotation platform.
 *
 * @packageDocumentation
 */

// Main client
export { HariClient } from './client';

// Configuration
export {
  BULK_UPLOAD_LIMITS,
  DEFAULT_AUTH_URL,
  DEFAULT_BASE_URL,
  DEFAULT_BATCH_SIZES,
  DEFAULT_CLIENT_ID,
  DEFAULT_TIMEOUT_MS,
  MAX_UNIQUE_ATTRIBUTES,
  loadConfigFromEnv,
  resolveBatchSizes,
} from './config';
export type { HariClientConfig, UploaderBatchSizes } from './config';

// Logging
export { consoleLogger, silentLogger } from './logger';
export type { Logger, LogContext } from './logger';

// HTTP layer
export { HttpClient } from './http';
export type { HttpClientConfig, RequestOptions } from './http';
export { TokenManager } from './auth';
export type { TokenManagerConfig } from './auth';

// Errors
export {
  HariError,
  NotFoundError,
  AuthenticationError,
  AuthorizationError,
  ValidationError,
  ConflictError,
  RateLimitError,
  ConfigurationError,
  BulkUploadSizeRangeError,
  ParseResponseModelError,
  AttributeValidationError,
  AttributeValidationInconsistentValueTypeError,
  AttributeValidationInconsistentListElementValueTypesError,
  AttributeValidationInconsistentListElementValueTypesMultipleAttributesError,
  AttributeValidationIdNotReusedError,
  UnknownObjectCategorySubsetNameError,
  MediaUploadError,
  MediaObjectUploadError,
  UniqueAttributesLimitExceededError,
  parseApiError,
} from './errors';

// Managers
export {
  BaseManager,
  MediaManager,
  MediaObjectManager,
  AttributeManager,
  SubsetManager,
} from './managers';

// Response schemas
export {
  bulkItemResponseSchema,
  bulkUploadSummarySchema,
  bulkResponseSchema,
  bulkConflictResponseSchema,
  mediaResponseSchema,
  mediaObjectResponseSchema,
  subsetResponseSchema,
  attributeMetadataResponseSchema,
  parseResponseModel,
  zodIssuesToMessages,
} from './schemas/bulk.zod';

// Upload
export * from './upload';

// Types
export {
  ANNOTATABLE_TYPES,
  BULK_OPERATION_STATUSES,
  RESPONSE_STATES,
} from './types';
export type {
  AnnotatableType,
  AttributeGroup,
  AttributeMetadataResponse,
  AttributeScalar,
  AttributeType,
  AttributeValue,
  BBox2DCenterPoint,
  BulkAttributeCreate,
  BulkItemResponse,
  BulkMediaCreate,
  BulkMediaObjectCreate,
  BulkOperationStatus,
  BulkResponse,
  BulkUploadSummary,
  CreateEmptySubsetParams,
  CuboidCenterPoint,
  DataSource,
  EntityKind,
  Geometry,
  GeometryType,
  ListEntitiesParams,
  MediaObjectResponse,
  MediaResponse,
  MediaType,
  Point2DTuple,
  Point2DXY,
  Point3DTuple,
  Point3DXYZ,
  PolyLine2DFlatCoordinates,
  QuaternionTuple,
  ResponseState,
  SubsetResponse,
  SubsetType,
  ValueClassification,
} from './types';
