/**
 * Zod schemas for HARI API responses
 *
 * Bulk and list responses are validated before they reach the uploader so
 * that a changed server contract surfaces as a ParseResponseModelError
 * rather than as an undefined id deep inside the upload run.
 */

import { z } from 'zod';
import { ANNOTATABLE_TYPES, BULK_OPERATION_STATUSES, RESPONSE_STATES } from '../types/common';
import { ParseResponseModelError } from '../errors';

// --- Bulk responses ---

export const bulkItemResponseSchema = z
  .object({
    item_id: z.string().nullish(),
    status: z.enum(RESPONSE_STATES),
    errors: z.array(z.string()).nullish(),
    bulk_operation_annotatable_id: z.string().nullish(),
    back_reference: z.string().nullish(),
    annotatable_id: z.string().nullish(),
  })
  .passthrough();

export const bulkUploadSummarySchema = z.object({
  total: z.number().int().nonnegative().default(0),
  successful: z.number().int().nonnegative().default(0),
  failed: z.number().int().nonnegative().default(0),
});

export const bulkResponseSchema = z.object({
  status: z.enum(BULK_OPERATION_STATUSES).default('processing'),
  summary: bulkUploadSummarySchema.default({}),
  results: z.array(bulkItemResponseSchema).default([]),
});

/** A 409 from a bulk endpoint carries the full bulk result, items included. */
export const bulkConflictResponseSchema = bulkResponseSchema.extend({
  results: z.array(bulkItemResponseSchema).min(1),
});

// --- Entity listings ---

export const mediaResponseSchema = z
  .object({
    id: z.string(),
    back_reference: z.string().nullish(),
    name: z.string().nullish(),
    media_url: z.string().nullish(),
    subset_ids: z.array(z.string()).nullish(),
  })
  .passthrough();

export const mediaObjectResponseSchema = z
  .object({
    id: z.string(),
    media_id: z.string().nullish(),
    back_reference: z.string().nullish(),
    object_category: z.string().nullish(),
    subset_ids: z.array(z.string()).nullish(),
  })
  .passthrough();

export const subsetResponseSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    subset_type: z.string().nullish(),
    object_category: z.boolean().nullish(),
  })
  .passthrough();

export const attributeMetadataResponseSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    annotatable_type: z.enum(ANNOTATABLE_TYPES).nullish(),
    value_type: z.string().nullish(),
  })
  .passthrough();

/** `POST /subsets` answers with the bare id of the created subset. */
export const subsetIdResponseSchema = z.string().min(1);

// --- Helpers ---

/**
 * Flatten zod issues into `path: message` strings
 */
export function zodIssuesToMessages(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Validate `data` against `schema`, throwing ParseResponseModelError naming
 * `model` when it doesn't match.
 */
export function parseResponseModel<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  model: string
): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ParseResponseModelError(model, data, zodIssuesToMessages(result.error));
  }
  return result.data;
}
