/**
 * Component Tests: HariClient
 *
 * Drives the client and its managers over HTTP against the in-memory HARI
 * API from tests/mocks.
 */

import { describe, expect, it } from 'vitest';
import { http, HttpResponse } from 'msw';
import {
  AuthenticationError,
  BulkUploadSizeRangeError,
  ConflictError,
  HariClient,
  NotFoundError,
  ParseResponseModelError,
  bulkResponseSchema,
  silentLogger,
  type BulkAttributeCreate,
  type BulkMediaCreate,
} from 'hari-sdk';
import {
  API_BASE,
  AUTH_BASE,
  TEST_PASSWORD,
  TEST_USERNAME,
  TOKEN_PATH,
  getStores,
  recordedRequests,
  seedSubset,
  server,
} from '../mocks/server';

const DATASET_ID = 'ds-1';

function createClient(password = TEST_PASSWORD): HariClient {
  return new HariClient({
    baseUrl: API_BASE,
    authUrl: AUTH_BASE,
    username: TEST_USERNAME,
    password,
    logger: silentLogger,
  });
}

function tokenRequests(): number {
  return recordedRequests().filter((request) => request.path.endsWith(TOKEN_PATH)).length;
}

function mediaPayload(backReference: string, mediaUrl: string | null = `https://storage.test/${backReference}.jpg`): BulkMediaCreate {
  return {
    name: `${backReference}.jpg`,
    media_type: 'image',
    back_reference: backReference,
    media_url: mediaUrl,
    archived: false,
    bulk_operation_annotatable_id: `corr-${backReference}`,
  };
}

describe('HariClient', () => {
  describe('authentication', () => {
    it('reuses one token across requests', async () => {
      const client = createClient();

      await client.medias.list(DATASET_ID);
      await client.mediaObjects.list(DATASET_ID);
      await client.subsets.list(DATASET_ID);

      expect(tokenRequests()).toBe(1);
    });

    it('shares one token request between concurrent calls', async () => {
      const client = createClient();

      await Promise.all([
        client.medias.list(DATASET_ID),
        client.subsets.list(DATASET_ID),
        client.attributes.listMetadata(DATASET_ID),
      ]);

      expect(tokenRequests()).toBe(1);
    });

    it('rejects bad credentials', async () => {
      const client = createClient('wrong-secret');

      await expect(client.medias.list(DATASET_ID)).rejects.toThrow(AuthenticationError);
      await expect(client.medias.list(DATASET_ID)).rejects.toThrow('Invalid username or password');
      expect(recordedRequests().some((request) => request.path.includes('/datasets/'))).toBe(false);
    });

    it('requires credentials up front', () => {
      expect(() => createClient('')).toThrow('Username and password are required');
    });

    it('authenticates again after the API answers 401', async () => {
      const client = createClient();
      server.use(
        http.get(`${API_BASE}/datasets/:datasetId/medias`, () =>
          HttpResponse.json({ detail: 'Token expired' }, { status: 401 }),
          { once: true }
        )
      );

      await expect(client.medias.list(DATASET_ID)).rejects.toThrow(AuthenticationError);
      await expect(client.medias.list(DATASET_ID)).resolves.toEqual([]);
      expect(tokenRequests()).toBe(2);
    });
  });

  describe('bulk endpoints', () => {
    it('creates medias and returns the parsed bulk response', async () => {
      const client = createClient();

      const response = await client.medias.createMany(DATASET_ID, [mediaPayload('a'), mediaPayload('b')]);

      expect(response.status).toBe('success');
      expect(response.summary).toEqual({ total: 2, successful: 2, failed: 0 });
      expect(response.results.map((result) => result.bulk_operation_annotatable_id)).toEqual([
        'corr-a',
        'corr-b',
      ]);
      expect(getStores().medias.map((media) => media.back_reference)).toEqual(['a', 'b']);
    });

    it('reports items the API rejects without failing the call', async () => {
      const client = createClient();

      const response = await client.medias.createMany(DATASET_ID, [mediaPayload('a'), mediaPayload('b', null)]);

      expect(response.status).toBe('partial_success');
      expect(response.results[1]).toMatchObject({
        item_id: null,
        status: 'missing_data',
        errors: ['media_url is required'],
        bulk_operation_annotatable_id: 'corr-b',
      });
    });

    it('refuses oversized batches before sending anything', async () => {
      const client = createClient();
      const medias = Array.from({ length: 501 }, (_, i) => mediaPayload(`m-${i}`));

      await expect(client.medias.createMany(DATASET_ID, medias)).rejects.toThrow(BulkUploadSizeRangeError);
      expect(recordedRequests()).toEqual([]);
    });

    it('raises a ConflictError carrying the bulk response on attribute conflicts', async () => {
      const client = createClient();
      const attribute: BulkAttributeCreate = {
        id: 'attr-1',
        name: 'weather',
        value: 'sunny',
        annotatable_id: 'media-x',
        annotatable_type: 'Media',
      };
      await client.attributes.createMany(DATASET_ID, [attribute]);

      const error: unknown = await client.attributes
        .createMany(DATASET_ID, [attribute])
        .catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(ConflictError);
      if (error instanceof ConflictError) {
        const body = bulkResponseSchema.parse(error.body);
        expect(body.status).toBe('failure');
        expect(body.results[0]).toMatchObject({ item_id: 'attr-1', status: 'conflict' });
      }
    });
  });

  describe('listings', () => {
    it('lists created medias and attribute metadata', async () => {
      const client = createClient();
      await client.medias.createMany(DATASET_ID, [mediaPayload('a')]);
      await client.attributes.createMany(DATASET_ID, [
        { id: 'attr-1', name: 'weather', value: 'sunny', annotatable_id: 'media-x', annotatable_type: 'Media' },
      ]);

      const medias = await client.medias.list(DATASET_ID);
      const metadata = await client.attributes.listMetadata(DATASET_ID);

      expect(medias).toHaveLength(1);
      expect(medias[0]).toMatchObject({ back_reference: 'a', media_url: 'https://storage.test/a.jpg' });
      expect(metadata).toEqual([{ id: 'attr-1', name: 'weather', annotatable_type: 'Media' }]);
    });

    it('rejects a listing that does not match the response model', async () => {
      const client = createClient();
      server.use(
        http.get(`${API_BASE}/datasets/:datasetId/subsets`, () => HttpResponse.json([{ name: 'no id' }]))
      );

      await expect(client.subsets.list(DATASET_ID)).rejects.toThrow(ParseResponseModelError);
    });

    it('maps a 404 to NotFoundError', async () => {
      const client = createClient();
      server.use(
        http.get(`${API_BASE}/datasets/:datasetId/mediaObjects`, () =>
          HttpResponse.json({ detail: 'Dataset not found' }, { status: 404 })
        )
      );

      await expect(client.mediaObjects.list(DATASET_ID)).rejects.toThrow(NotFoundError);
    });
  });

  describe('subsets', () => {
    it('creates an empty object category subset and returns its id', async () => {
      const client = createClient();

      const id = await client.subsets.createEmpty(DATASET_ID, {
        subset_type: 'media_object',
        subset_name: 'car',
        object_category: true,
      });

      // token-1 is issued first
      expect(id).toBe('subset-2');
      expect(await client.subsets.list(DATASET_ID)).toEqual([
        { id: 'subset-2', dataset_id: DATASET_ID, name: 'car', subset_type: 'media_object', object_category: true },
      ]);
    });

    it('lists below the dataset and creates through the subsets endpoint', async () => {
      const client = createClient();

      await client.subsets.createEmpty(DATASET_ID, { subset_type: 'media', subset_name: 'night' });
      await client.subsets.list(DATASET_ID);

      expect(recordedRequests().slice(1).map((request) => [request.method, request.path])).toEqual([
        ['POST', '/subsets'],
        ['GET', `/datasets/${DATASET_ID}/subsets`],
      ]);
    });

    it('lists only the subsets of the requested dataset', async () => {
      const client = createClient();
      seedSubset({ id: 'other', dataset_id: 'ds-2', name: 'car', subset_type: 'media_object', object_category: true });
      seedSubset({ id: 'mine', dataset_id: DATASET_ID, name: 'bike', subset_type: 'media_object', object_category: true });

      const subsets = await client.subsets.list(DATASET_ID);

      expect(subsets.map((subset) => subset.id)).toEqual(['mine']);
    });
  });
});
