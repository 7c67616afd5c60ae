/**
 * Duplicate Detection
 *
 * Marks queued medias or media objects whose back_reference already exists
 * on the server. Matching is by back_reference only; content is not compared.
 */

import type { Logger } from '../logger';
import type { UploadState } from './entities';

export interface DuplicateCandidate {
  readonly back_reference: string;
  readonly upload: UploadState;
}

export interface ExistingEntity {
  id: string;
  back_reference?: string | null;
}

/**
 * Set `upload.uploaded` and `upload.id` on every candidate from the
 * back_reference lookup built over `existing`. Returns the number of
 * candidates marked as already uploaded.
 */
export function markDuplicates(
  candidates: readonly DuplicateCandidate[],
  existing: readonly ExistingEntity[],
  logger: Logger
): number {
  const idsByBackReference = new Map<string, string>();
  for (const entity of existing) {
    if (entity.back_reference === undefined || entity.back_reference === null) continue;
    if (idsByBackReference.has(entity.back_reference)) {
      logger.warn(
        `Multiple of the same back_reference '${entity.back_reference}' encountered; overwriting previous value.`
      );
    }
    idsByBackReference.set(entity.back_reference, entity.id);
  }

  let marked = 0;
  for (const candidate of candidates) {
    const id = idsByBackReference.get(candidate.back_reference);
    candidate.upload.uploaded = id !== undefined;
    candidate.upload.id = id ?? null;
    if (id !== undefined) marked++;
  }
  return marked;
}
