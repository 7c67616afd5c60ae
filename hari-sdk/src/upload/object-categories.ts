/**
 * Object Category Resolution
 *
 * Every object category label maps to a media object subset flagged
 * `object_category`. Missing subsets are created before any media is
 * uploaded so that media objects can carry the subset id.
 */

import { UnknownObjectCategorySubsetNameError } from '../errors';
import type { Logger } from '../logger';
import type { UploadBackend } from './backend';
import type { HariMedia } from './entities';

/**
 * Labels referenced by queued media objects
 */
export function collectObjectCategoryLabels(medias: readonly HariMedia[]): Set<string> {
  const labels = new Set<string>();
  for (const media of medias) {
    for (const mediaObject of media.media_objects) {
      if (mediaObject.object_category_subset_name) {
        labels.add(mediaObject.object_category_subset_name);
      }
    }
  }
  return labels;
}

function addUnique(ids: string[], id: string): void {
  if (!ids.includes(id)) ids.push(id);
}

/**
 * Write resolved subset ids onto labelled media objects and their medias
 */
export function assignObjectCategories(
  medias: readonly HariMedia[],
  subsetIdsByLabel: ReadonlyMap<string, string>
): void {
  for (const media of medias) {
    for (const mediaObject of media.media_objects) {
      const label = mediaObject.object_category_subset_name;
      if (!label) continue;

      const subsetId = subsetIdsByLabel.get(label);
      if (subsetId === undefined) {
        throw new UnknownObjectCategorySubsetNameError(label);
      }
      mediaObject.object_category = subsetId;
      addUnique(mediaObject.subset_ids, subsetId);
      addUnique(media.subset_ids, subsetId);
    }
  }
}

/**
 * Find or create a subset for each referenced or declared label, assign the
 * subset ids, and return the label → subset id mapping.
 */
export async function resolveObjectCategories(
  backend: UploadBackend,
  datasetId: string,
  medias: readonly HariMedia[],
  declared: Iterable<string>,
  logger: Logger
): Promise<Map<string, string>> {
  const labels = collectObjectCategoryLabels(medias);
  for (const label of declared) {
    labels.add(label);
  }
  const subsetIdsByLabel = new Map<string, string>();
  if (labels.size === 0) return subsetIdsByLabel;

  const subsets = await backend.listSubsets(datasetId);
  for (const subset of subsets) {
    if (subset.object_category === true) {
      subsetIdsByLabel.set(subset.name, subset.id);
    }
  }

  const missing = [...labels].filter((label) => !subsetIdsByLabel.has(label)).sort();
  if (missing.length > 0) {
    logger.info(`Creating ${missing.length} object category subsets.`, { labels: missing });
  }
  for (const label of missing) {
    const subsetId = await backend.createSubset(datasetId, {
      subsetType: 'media_object',
      name: label,
      objectCategory: true,
    });
    subsetIdsByLabel.set(label, subsetId);
  }

  assignObjectCategories(medias, subsetIdsByLabel);
  return subsetIdsByLabel;
}
