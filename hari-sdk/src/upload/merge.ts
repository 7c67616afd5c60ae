/**
 * Bulk Response Merging
 */

import type { BulkOperationStatus, BulkResponse } from '../types';

/**
 * Response for a request that had nothing to send
 */
export function emptyBulkResponse(): BulkResponse {
  return {
    status: 'success',
    summary: { total: 0, successful: 0, failed: 0 },
    results: [],
  };
}

function mergeStatuses(statuses: ReadonlySet<BulkOperationStatus>): BulkOperationStatus {
  if (statuses.size === 1) {
    const [status] = statuses;
    return status;
  }
  return statuses.has('success') ? 'partial_success' : 'failure';
}

/**
 * Combine partial bulk responses into one.
 *
 * No input gives an empty `success` response and a single input is returned
 * as is. Otherwise results are concatenated in order, summary counters are
 * summed, and the status is kept when all inputs agree, `partial_success`
 * when any input succeeded, else `failure`.
 */
export function mergeBulkResponses(...responses: BulkResponse[]): BulkResponse {
  if (responses.length === 0) return emptyBulkResponse();
  if (responses.length === 1) return responses[0];

  const merged: BulkResponse = {
    status: 'processing',
    summary: { total: 0, successful: 0, failed: 0 },
    results: [],
  };
  const statuses = new Set<BulkOperationStatus>();

  for (const response of responses) {
    for (const result of response.results) {
      merged.results.push(result);
    }
    merged.summary.total += response.summary.total;
    merged.summary.successful += response.summary.successful;
    merged.summary.failed += response.summary.failed;
    statuses.add(response.status);
  }

  merged.status = mergeStatuses(statuses);
  return merged;
}
