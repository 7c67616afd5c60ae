/**
 * Unit Tests: Configuration
 */

import { describe, expect, it } from 'vitest';
import {
  ConfigurationError,
  DEFAULT_AUTH_URL,
  DEFAULT_BASE_URL,
  DEFAULT_BATCH_SIZES,
  DEFAULT_CLIENT_ID,
  DEFAULT_TIMEOUT_MS,
  loadConfigFromEnv,
  resolveBatchSizes,
} from 'hari-sdk';

describe('resolveBatchSizes', () => {
  it('returns the defaults without overrides', () => {
    expect(resolveBatchSizes()).toEqual({ media: 30, mediaObject: 500, attribute: 500 });
    expect(resolveBatchSizes()).toEqual(DEFAULT_BATCH_SIZES);
  });

  it('keeps overrides and fills the rest', () => {
    expect(resolveBatchSizes({ media: 500 })).toEqual({ media: 500, mediaObject: 500, attribute: 500 });
  });

  it('accepts every endpoint ceiling', () => {
    expect(resolveBatchSizes({ media: 500, mediaObject: 5000, attribute: 750 })).toEqual({
      media: 500,
      mediaObject: 5000,
      attribute: 750,
    });
  });

  it.each([
    [{ media: 501 }],
    [{ mediaObject: 5001 }],
    [{ attribute: 751 }],
    [{ media: 0 }],
    [{ attribute: 2.5 }],
  ])('rejects %o', (overrides) => {
    expect(() => resolveBatchSizes(overrides)).toThrow(ConfigurationError);
  });

  it('names the offending field in the issues', () => {
    try {
      resolveBatchSizes({ media: 501 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.message).toBe('Invalid uploader batch sizes');
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]).toMatch(/^media: /);
      }
    }
  });
});

describe('loadConfigFromEnv', () => {
  it('fills defaults around the credentials', () => {
    const config = loadConfigFromEnv({ HARI_USERNAME: 'test-user', HARI_PASSWORD: 'test-secret' });

    expect(config).toEqual({
      baseUrl: DEFAULT_BASE_URL,
      authUrl: DEFAULT_AUTH_URL,
      clientId: DEFAULT_CLIENT_ID,
      username: 'test-user',
      password: 'test-secret',
      timeout: DEFAULT_TIMEOUT_MS,
      uploader: { media: 30, mediaObject: 500, attribute: 500 },
    });
  });

  it('reads urls, timeout and batch sizes', () => {
    const config = loadConfigFromEnv({
      HARI_USERNAME: 'test-user',
      HARI_PASSWORD: 'test-secret',
      HARI_API_BASE_URL: 'http://hari.test',
      HARI_AUTH_URL: 'http://auth.test/auth',
      HARI_CLIENT_ID: 'test-client',
      HARI_TIMEOUT: '5000',
      HARI_UPLOADER__MEDIA_UPLOAD_BATCH_SIZE: '100',
      HARI_UPLOADER__MEDIA_OBJECT_UPLOAD_BATCH_SIZE: '1000',
      HARI_UPLOADER__ATTRIBUTE_UPLOAD_BATCH_SIZE: '750',
    });

    expect(config.baseUrl).toBe('http://hari.test');
    expect(config.authUrl).toBe('http://auth.test/auth');
    expect(config.clientId).toBe('test-client');
    expect(config.timeout).toBe(5000);
    expect(config.uploader).toEqual({ media: 100, mediaObject: 1000, attribute: 750 });
  });

  it('requires credentials', () => {
    expect(() => loadConfigFromEnv({})).toThrow('Invalid HARI environment configuration');
  });

  it('rejects a non-numeric batch size', () => {
    expect(() =>
      loadConfigFromEnv({
        HARI_USERNAME: 'test-user',
        HARI_PASSWORD: 'test-secret',
        HARI_UPLOADER__MEDIA_UPLOAD_BATCH_SIZE: 'many',
      })
    ).toThrow(ConfigurationError);
  });

  it('rejects a batch size over the endpoint ceiling', () => {
    expect(() =>
      loadConfigFromEnv({
        HARI_USERNAME: 'test-user',
        HARI_PASSWORD: 'test-secret',
        HARI_UPLOADER__MEDIA_UPLOAD_BATCH_SIZE: '501',
      })
    ).toThrow('Invalid uploader batch sizes');
  });
});
