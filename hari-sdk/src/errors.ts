/**
 * HARI SDK Error Types
 */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Base error class for all HARI SDK errors
 */
export class HariError extends Error {
  public readonly code: string;
  public readonly statusCode?: number;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, statusCode?: number, details?: Record<string, unknown>) {
    super(message);
    this.name = 'HariError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    Object.setPrototypeOf(this, HariError.prototype);
  }
}

/**
 * Error thrown when a resource is not found
 */
export class NotFoundError extends HariError {
  constructor(message = 'Resource not found') {
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Error thrown when authentication fails
 */
export class AuthenticationError extends HariError {
  constructor(message = 'Authentication failed') {
    super(message, 'UNAUTHORIZED', 401);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Error thrown when authorization fails
 */
export class AuthorizationError extends HariError {
  constructor(message = 'Permission denied') {
    super(message, 'FORBIDDEN', 403);
    this.name = 'AuthorizationError';
    Object.setPrototypeOf(this, AuthorizationError.prototype);
  }
}

/**
 * Error thrown when the API rejects a request body
 */
export class ValidationError extends HariError {
  public readonly validationErrors: string[];

  constructor(message: string, errors: string[] = [], statusCode = 400) {
    super(message, 'VALIDATION_ERROR', statusCode);
    this.name = 'ValidationError';
    this.validationErrors = errors;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Error thrown on a 409 response. The raw response body is kept, because
 * bulk endpoints answer a conflict with a complete bulk result.
 */
export class ConflictError extends HariError {
  public readonly body: unknown;

  constructor(message: string, body?: unknown) {
    super(message, 'CONFLICT', 409);
    this.name = 'ConflictError';
    this.body = body;
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

/**
 * Error thrown when rate limited
 */
export class RateLimitError extends HariError {
  public readonly retryAfter?: number;

  constructor(message = 'Rate limit exceeded', retryAfter?: number) {
    super(message, 'RATE_LIMITED', 429);
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

/**
 * Error thrown for invalid client or uploader configuration
 */
export class ConfigurationError extends HariError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Error thrown when a bulk call receives more items than the endpoint accepts
 */
export class BulkUploadSizeRangeError extends HariError {
  public readonly limit: number;
  public readonly foundAmount: number;

  constructor(limit: number, foundAmount: number) {
    super(
      `You tried to upload ${foundAmount} items at once, but the limit is ${limit}.`,
      'BULK_UPLOAD_SIZE_RANGE'
    );
    this.name = 'BulkUploadSizeRangeError';
    this.limit = limit;
    this.foundAmount = foundAmount;
    Object.setPrototypeOf(this, BulkUploadSizeRangeError.prototype);
  }
}

/**
 * Error thrown when a response body doesn't match the expected model
 */
export class ParseResponseModelError extends HariError {
  public readonly responseData: unknown;
  public readonly issues: string[];

  constructor(model: string, responseData: unknown, issues: string[] = []) {
    super(`Failed to parse response data into ${model}: ${issues.join('; ')}`, 'PARSE_RESPONSE_MODEL');
    this.name = 'ParseResponseModelError';
    this.responseData = responseData;
    this.issues = issues;
    Object.setPrototypeOf(this, ParseResponseModelError.prototype);
  }
}

// =============================================================================
// Attribute validation
// =============================================================================

/**
 * Base class of the attribute consistency errors raised before an upload
 */
export class AttributeValidationError extends HariError {
  public readonly attributeName: string;
  public readonly annotatableType: string;

  constructor(message: string, code: string, attributeName: string, annotatableType: string) {
    super(message, code);
    this.name = 'AttributeValidationError';
    this.attributeName = attributeName;
    this.annotatableType = annotatableType;
    Object.setPrototypeOf(this, AttributeValidationError.prototype);
  }
}

export class AttributeValidationInconsistentValueTypeError extends AttributeValidationError {
  public readonly foundValueTypes: string[];

  constructor(attributeName: string, annotatableType: string, foundValueTypes: string[]) {
    super(
      `Attribute "${attributeName}" of annotatable type ${annotatableType} has inconsistent value types: ${foundValueTypes.join(', ')}`,
      'ATTRIBUTE_INCONSISTENT_VALUE_TYPE',
      attributeName,
      annotatableType
    );
    this.name = 'AttributeValidationInconsistentValueTypeError';
    this.foundValueTypes = foundValueTypes;
    Object.setPrototypeOf(this, AttributeValidationInconsistentValueTypeError.prototype);
  }
}

export class AttributeValidationInconsistentListElementValueTypesError extends AttributeValidationError {
  public readonly foundValueTypes: string[];

  constructor(attributeName: string, annotatableType: string, foundValueTypes: string[]) {
    super(
      `List value of attribute "${attributeName}" of annotatable type ${annotatableType} mixes element types: ${foundValueTypes.join(', ')}`,
      'ATTRIBUTE_INCONSISTENT_LIST_ELEMENT_VALUE_TYPES',
      attributeName,
      annotatableType
    );
    this.name = 'AttributeValidationInconsistentListElementValueTypesError';
    this.foundValueTypes = foundValueTypes;
    Object.setPrototypeOf(this, AttributeValidationInconsistentListElementValueTypesError.prototype);
  }
}

export class AttributeValidationInconsistentListElementValueTypesMultipleAttributesError extends AttributeValidationError {
  public readonly foundValueTypes: string[];

  constructor(attributeName: string, annotatableType: string, foundValueTypes: string[]) {
    super(
      `Attributes named "${attributeName}" of annotatable type ${annotatableType} hold lists of different element types: ${foundValueTypes.join(', ')}`,
      'ATTRIBUTE_INCONSISTENT_LIST_ELEMENT_VALUE_TYPES_MULTIPLE_ATTRIBUTES',
      attributeName,
      annotatableType
    );
    this.name = 'AttributeValidationInconsistentListElementValueTypesMultipleAttributesError';
    this.foundValueTypes = foundValueTypes;
    Object.setPrototypeOf(
      this,
      AttributeValidationInconsistentListElementValueTypesMultipleAttributesError.prototype
    );
  }
}

export class AttributeValidationIdNotReusedError extends AttributeValidationError {
  public readonly foundIds: string[];

  constructor(attributeName: string, annotatableType: string, foundIds: string[]) {
    super(
      `Attributes named "${attributeName}" of annotatable type ${annotatableType} must share one id, found: ${foundIds.join(', ')}`,
      'ATTRIBUTE_ID_NOT_REUSED',
      attributeName,
      annotatableType
    );
    this.name = 'AttributeValidationIdNotReusedError';
    this.foundIds = foundIds;
    Object.setPrototypeOf(this, AttributeValidationIdNotReusedError.prototype);
  }
}

// =============================================================================
// Upload orchestration
// =============================================================================

export class UnknownObjectCategorySubsetNameError extends HariError {
  public readonly objectCategory: string;

  constructor(objectCategory: string) {
    super(
      `No object category subset could be resolved for "${objectCategory}"`,
      'UNKNOWN_OBJECT_CATEGORY'
    );
    this.name = 'UnknownObjectCategorySubsetNameError';
    this.objectCategory = objectCategory;
    Object.setPrototypeOf(this, UnknownObjectCategorySubsetNameError.prototype);
  }
}

export class MediaUploadError extends HariError {
  constructor(message: string) {
    super(message, 'MEDIA_UPLOAD_ERROR');
    this.name = 'MediaUploadError';
    Object.setPrototypeOf(this, MediaUploadError.prototype);
  }
}

export class MediaObjectUploadError extends HariError {
  constructor(message: string) {
    super(message, 'MEDIA_OBJECT_UPLOAD_ERROR');
    this.name = 'MediaObjectUploadError';
    Object.setPrototypeOf(this, MediaObjectUploadError.prototype);
  }
}

export class UniqueAttributesLimitExceededError extends HariError {
  public readonly newAttributesNumber: number;
  public readonly existingAttributesNumber: number;
  public readonly intendedAttributesNumber: number;

  constructor(
    limit: number,
    newAttributesNumber: number,
    existingAttributesNumber: number,
    intendedAttributesNumber: number
  ) {
    let message = `You are trying to upload too many attributes with ${newAttributesNumber} different ids for one dataset`;
    if (existingAttributesNumber > 0) {
      message +=
        `, and there are already ${existingAttributesNumber} different attribute ids uploaded. ` +
        `The intended number of all attribute ids per dataset would be ${intendedAttributesNumber},`;
    }
    message +=
      ` when the limit is ${limit}. ` +
      'Reuse the ids of attributes that have the same name and annotatable type.';

    super(message, 'UNIQUE_ATTRIBUTES_LIMIT_EXCEEDED');
    this.name = 'UniqueAttributesLimitExceededError';
    this.newAttributesNumber = newAttributesNumber;
    this.existingAttributesNumber = existingAttributesNumber;
    this.intendedAttributesNumber = intendedAttributesNumber;
    Object.setPrototypeOf(this, UniqueAttributesLimitExceededError.prototype);
  }
}

// =============================================================================
// Response mapping
// =============================================================================

function extractMessage(body: unknown): string {
  if (typeof body === 'string' && body.length > 0) return body;
  if (isRecord(body)) {
    if (typeof body.message === 'string') return body.message;
    if (typeof body.detail === 'string') return body.detail;
  }
  return 'Unknown error';
}

function extractValidationErrors(body: unknown): string[] {
  if (!isRecord(body)) return [];
  const { detail } = body;
  if (!Array.isArray(detail)) return [];
  return detail.map((entry) => {
    if (isRecord(entry) && typeof entry.msg === 'string') {
      const loc = Array.isArray(entry.loc) ? entry.loc.join('.') : '';
      return loc ? `${loc}: ${entry.msg}` : entry.msg;
    }
    return String(entry);
  });
}

/**
 * Convert API error response to appropriate error class
 */
export function parseApiError(statusCode: number, body: unknown, retryAfter?: number): HariError {
  const message = extractMessage(body);

  switch (statusCode) {
    case 400:
    case 422:
      return new ValidationError(message, extractValidationErrors(body), statusCode);
    case 401:
      return new AuthenticationError(message);
    case 403:
      return new AuthorizationError(message);
    case 404:
      return new NotFoundError(message);
    case 409:
      return new ConflictError(message, body);
    case 429:
      return new RateLimitError(message, retryAfter);
    default: {
      const code = isRecord(body) && typeof body.code === 'string' ? body.code : 'UNKNOWN';
      return new HariError(message, code, statusCode, isRecord(body) ? body : undefined);
    }
  }
}
