/**
 * Batching upload of media trees
 */

export { HariUploader } from './uploader';
export type {
  HariUploaderOptions,
  HariUploadResults,
  UploadProgress,
  UploaderState,
} from './uploader';
export { HariMedia, HariMediaObject, HariAttribute } from './entities';
export type {
  Annotatable,
  AttributeTarget,
  HariAttributeInit,
  HariMediaInit,
  HariMediaObjectInit,
  MediaObjectUploadState,
  UploadState,
} from './entities';
export { classifyValue, validateAttributes } from './attribute-validation';
export { markDuplicates } from './duplicates';
export type { DuplicateCandidate, ExistingEntity } from './duplicates';
export {
  assignObjectCategories,
  collectObjectCategoryLabels,
  resolveObjectCategories,
} from './object-categories';
export { emptyBulkResponse, mergeBulkResponses } from './merge';
export { chunk } from './batching';
export { ManagerUploadBackend } from './backend';
export type {
  BulkCreateRequest,
  CreateSubsetRequest,
  ListableKind,
  UploadBackend,
  UploadManagers,
} from './backend';
