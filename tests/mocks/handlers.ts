/**
 * MSW Request Handlers
 *
 * In-memory stand-in for the HARI API and its auth server.
 */

import { http, HttpResponse } from 'msw';

export const API_BASE = 'http://hari.test';
export const AUTH_BASE = 'http://auth.test/auth';
export const TOKEN_PATH = '/realms/BBQ/protocol/openid-connect/token';

export const TEST_USERNAME = 'test-user';
export const TEST_PASSWORD = 'test-secret';
export const TOKEN_LIFETIME_SECONDS = 300;

// Types
interface StoredMedia {
  id: string;
  dataset_id: string;
  name: string;
  back_reference: string;
  media_url: string;
  subset_ids: string[];
}

interface StoredMediaObject {
  id: string;
  dataset_id: string;
  media_id: string;
  back_reference: string;
  object_category: string | null;
  subset_ids: string[];
}

interface StoredAttribute {
  id: string;
  dataset_id: string;
  name: string;
  value: unknown;
  annotatable_id: string;
  annotatable_type: string;
}

interface StoredSubset {
  id: string;
  dataset_id: string;
  name: string;
  subset_type: string;
  object_category: boolean;
}

interface ItemResult {
  item_id: string | null;
  status: 'success' | 'conflict' | 'bad_data' | 'missing_data';
  errors: string[] | null;
  bulk_operation_annotatable_id?: string | null;
  back_reference?: string;
  annotatable_id?: string;
}

export interface RecordedRequest {
  method: string;
  path: string;
  itemCount: number;
}

interface Stores {
  medias: StoredMedia[];
  mediaObjects: StoredMediaObject[];
  attributes: StoredAttribute[];
  subsets: StoredSubset[];
  tokens: Set<string>;
  requests: RecordedRequest[];
  counter: number;
}

// In-memory stores for stateful mocks
const stores: Stores = {
  medias: [],
  mediaObjects: [],
  attributes: [],
  subsets: [],
  tokens: new Set<string>(),
  requests: [],
  counter: 0,
};

// Helpers
function generateId(prefix: string): string {
  stores.counter += 1;
  return `${prefix}-${stores.counter}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(item: Record<string, unknown>, key: string): string | null {
  const value = item[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : [];
}

function checkAuth(request: Request): boolean {
  const auth = request.headers.get('Authorization');
  if (!auth?.startsWith('Bearer ')) return false;
  return stores.tokens.has(auth.slice(7).trim());
}

function unauthorized() {
  return HttpResponse.json({ detail: 'Not authenticated' }, { status: 401 });
}

function record(request: Request, itemCount = 0) {
  stores.requests.push({
    method: request.method,
    path: new URL(request.url).pathname,
    itemCount,
  });
}

function bulkBody(results: ItemResult[]) {
  const successful = results.filter((r) => r.status === 'success').length;
  const failed = results.length - successful;
  const status = failed === 0 ? 'success' : successful === 0 ? 'failure' : 'partial_success';
  return { status, summary: { total: results.length, successful, failed }, results };
}

async function readItems(request: Request): Promise<Record<string, unknown>[] | null> {
  const body: unknown = await request.json();
  if (!Array.isArray(body)) return null;
  return body.filter(isRecord);
}

function badRequest(message: string) {
  return HttpResponse.json(
    { detail: [{ loc: ['body'], msg: message, type: 'value_error' }] },
    { status: 422 }
  );
}

// =============================================================================
// Bulk creation
// =============================================================================

function createMedias(datasetId: string, items: Record<string, unknown>[]): ItemResult[] {
  return items.map((item): ItemResult => {
    const correlationId = stringField(item, 'bulk_operation_annotatable_id');
    const backReference = stringField(item, 'back_reference') ?? '';
    const mediaUrl = stringField(item, 'media_url');
    if (!mediaUrl) {
      return {
        item_id: null,
        status: 'missing_data',
        errors: ['media_url is required'],
        bulk_operation_annotatable_id: correlationId,
        back_reference: backReference,
      };
    }
    const media: StoredMedia = {
      id: generateId('media'),
      dataset_id: datasetId,
      name: stringField(item, 'name') ?? '',
      back_reference: backReference,
      media_url: mediaUrl,
      subset_ids: stringList(item.subset_ids),
    };
    stores.medias.push(media);
    return {
      item_id: media.id,
      status: 'success',
      errors: null,
      bulk_operation_annotatable_id: correlationId,
      back_reference: backReference,
    };
  });
}

function createMediaObjects(datasetId: string, items: Record<string, unknown>[]): ItemResult[] {
  return items.map((item): ItemResult => {
    const correlationId = stringField(item, 'bulk_operation_annotatable_id');
    const backReference = stringField(item, 'back_reference') ?? '';
    const mediaId = stringField(item, 'media_id');
    if (!mediaId || !stores.medias.some((media) => media.id === mediaId)) {
      return {
        item_id: null,
        status: 'missing_data',
        errors: [`Unknown media_id ${String(mediaId)}`],
        bulk_operation_annotatable_id: correlationId,
        back_reference: backReference,
      };
    }
    const mediaObject: StoredMediaObject = {
      id: generateId('media-object'),
      dataset_id: datasetId,
      media_id: mediaId,
      back_reference: backReference,
      object_category: stringField(item, 'object_category'),
      subset_ids: stringList(item.subset_ids),
    };
    stores.mediaObjects.push(mediaObject);
    return {
      item_id: mediaObject.id,
      status: 'success',
      errors: null,
      bulk_operation_annotatable_id: correlationId,
      back_reference: backReference,
    };
  });
}

function createAttributes(datasetId: string, items: Record<string, unknown>[]): ItemResult[] {
  return items.map((item): ItemResult => {
    const id = stringField(item, 'id');
    const annotatableId = stringField(item, 'annotatable_id');
    const annotatableType = stringField(item, 'annotatable_type');
    if (!id || !annotatableId || !annotatableType) {
      return {
        item_id: id,
        status: 'missing_data',
        errors: ['id, annotatable_id and annotatable_type are required'],
        annotatable_id: annotatableId ?? '',
      };
    }
    const exists = stores.attributes.some(
      (attribute) =>
        attribute.dataset_id === datasetId &&
        attribute.id === id &&
        attribute.annotatable_id === annotatableId
    );
    if (exists) {
      return {
        item_id: id,
        status: 'conflict',
        errors: [`Attribute ${id} already exists on ${annotatableId}`],
        annotatable_id: annotatableId,
      };
    }
    stores.attributes.push({
      id,
      dataset_id: datasetId,
      name: stringField(item, 'name') ?? '',
      value: item.value,
      annotatable_id: annotatableId,
      annotatable_type: annotatableType,
    });
    return { item_id: id, status: 'success', errors: null, annotatable_id: annotatableId };
  });
}

// =============================================================================
// Listings
// =============================================================================

function attributeMetadata(datasetId: string) {
  const byId = new Map<string, { id: string; name: string; annotatable_type: string }>();
  for (const attribute of stores.attributes) {
    if (attribute.dataset_id !== datasetId || byId.has(attribute.id)) continue;
    byId.set(attribute.id, {
      id: attribute.id,
      name: attribute.name,
      annotatable_type: attribute.annotatable_type,
    });
  }
  return [...byId.values()];
}

// =============================================================================
// Auth Endpoints
// =============================================================================
const authHandlers = [
  http.post(`${AUTH_BASE}${TOKEN_PATH}`, async ({ request }) => {
    record(request);
    const form = new URLSearchParams(await request.text());
    if (
      form.get('grant_type') !== 'password' ||
      form.get('username') !== TEST_USERNAME ||
      form.get('password') !== TEST_PASSWORD
    ) {
      return HttpResponse.json({ error: 'invalid_grant' }, { status: 401 });
    }
    const token = generateId('token');
    stores.tokens.add(token);
    return HttpResponse.json({
      access_token: token,
      expires_in: TOKEN_LIFETIME_SECONDS,
      token_type: 'Bearer',
    });
  }),
];

// =============================================================================
// Dataset Endpoints
// =============================================================================
const datasetHandlers = [
  http.post(`${API_BASE}/datasets/:datasetId/:action`, async ({ request, params }) => {
    if (!checkAuth(request)) return unauthorized();
    const datasetId = decodeURIComponent(String(params.datasetId));
    const action = decodeURIComponent(String(params.action));

    const items = await readItems(request);
    if (!items) return badRequest('Expected a list of items');
    record(request, items.length);

    switch (action) {
      case 'medias:bulk':
        return HttpResponse.json(bulkBody(createMedias(datasetId, items)));
      case 'mediaObjects:bulk':
        return HttpResponse.json(bulkBody(createMediaObjects(datasetId, items)));
      case 'attributes:bulk': {
        const body = bulkBody(createAttributes(datasetId, items));
        const conflicted = body.results.some((result) => result.status === 'conflict');
        return HttpResponse.json(body, { status: conflicted ? 409 : 200 });
      }
      default:
        return HttpResponse.json({ detail: 'Not Found' }, { status: 404 });
    }
  }),

  http.get(`${API_BASE}/datasets/:datasetId/:resource`, ({ request, params }) => {
    if (!checkAuth(request)) return unauthorized();
    record(request);
    const datasetId = decodeURIComponent(String(params.datasetId));
    const resource = decodeURIComponent(String(params.resource));

    switch (resource) {
      case 'medias':
        return HttpResponse.json(stores.medias.filter((m) => m.dataset_id === datasetId));
      case 'mediaObjects':
        return HttpResponse.json(stores.mediaObjects.filter((m) => m.dataset_id === datasetId));
      case 'subsets':
        return HttpResponse.json(stores.subsets.filter((s) => s.dataset_id === datasetId));
      case 'attributeMetadata':
        return HttpResponse.json(attributeMetadata(datasetId));
      default:
        return HttpResponse.json({ detail: 'Not Found' }, { status: 404 });
    }
  }),

  http.post(`${API_BASE}/subsets`, ({ request }) => {
    if (!checkAuth(request)) return unauthorized();
    record(request);
    const query = new URL(request.url).searchParams;
    const datasetId = query.get('dataset_id');
    const name = query.get('subset_name');
    const subsetType = query.get('subset_type');
    if (!datasetId || !name || !subsetType) {
      return badRequest('dataset_id, subset_type and subset_name are required');
    }
    const subset: StoredSubset = {
      id: generateId('subset'),
      dataset_id: datasetId,
      name,
      subset_type: subsetType,
      object_category: query.get('object_category') === 'true',
    };
    stores.subsets.push(subset);
    return HttpResponse.json(subset.id);
  }),
];

export const handlers = [...authHandlers, ...datasetHandlers];

// =============================================================================
// Store access for tests
// =============================================================================

export function resetStores() {
  stores.medias = [];
  stores.mediaObjects = [];
  stores.attributes = [];
  stores.subsets = [];
  stores.tokens.clear();
  stores.requests = [];
  stores.counter = 0;
}

export function getStores() {
  return stores;
}

/**
 * Requests that reached the mock, in arrival order
 */
export function recordedRequests(): RecordedRequest[] {
  return [...stores.requests];
}

export function seedSubset(subset: Omit<StoredSubset, 'id'> & { id?: string }): string {
  const id = subset.id ?? generateId('subset');
  stores.subsets.push({ ...subset, id });
  return id;
}
