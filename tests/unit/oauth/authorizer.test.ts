/**
 * Unit Tests for PasswordGrantAuthorizer
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PasswordGrantAuthorizer } from '../../../src/oauth/authorizer.js';
import type { Credential } from '../../../src/oauth/options.js';

const mockFetch = vi.fn();

const credential: Credential = { access: 'api-id', secret: 'api-secret', digest: 'bzE6cDE=' };

function tokenResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('PasswordGrantAuthorizer', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe('constructor', () => {
    it('should reject a credential with empty fields', () => {
      expect(
        () =>
          new PasswordGrantAuthorizer(
            { access: 'api-id', secret: '', digest: '' },
            { baseUrl: 'https://privx.example.com' }
          )
      ).toThrow('Configuration error: missing credential field(s): secret, digest');
    });

    it('should reject an invalid base URL', () => {
      expect(() => new PasswordGrantAuthorizer(credential, { baseUrl: 'not a url' })).toThrow();
    });
  });

  describe('accessToken', () => {
    it('should perform a password grant with the digest as Basic auth', async () => {
      mockFetch.mockResolvedValueOnce(tokenResponse({ access_token: 'token-1', expires_in: 300 }));
      const authorizer = new PasswordGrantAuthorizer(credential, { baseUrl: 'https://privx.example.com/' });

      const token = await authorizer.accessToken();

      expect(token).toBe('token-1');
      expect(mockFetch).toHaveBeenCalledWith(
        'https://privx.example.com/auth/api/v1/oauth/token',
        expect.objectContaining({
          method: 'POST',
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
            Accept: 'application/json',
            Authorization: 'Basic bzE6cDE=',
          },
          body: 'grant_type=password&username=api-id&password=api-secret',
        })
      );
    });

    it('should reuse a cached token until it nears expiry', async () => {
      mockFetch.mockImplementation(async () => tokenResponse({ access_token: 'token-1', expires_in: 300 }));
      const authorizer = new PasswordGrantAuthorizer(credential, { baseUrl: 'https://privx.example.com' });

      await authorizer.accessToken();
      await authorizer.accessToken();

      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should grant again once the cached token is stale', async () => {
      vi.useFakeTimers();
      try {
        mockFetch
          .mockResolvedValueOnce(tokenResponse({ access_token: 'token-1', expires_in: 60 }))
          .mockResolvedValueOnce(tokenResponse({ access_token: 'token-2', expires_in: 60 }));
        const authorizer = new PasswordGrantAuthorizer(credential, { baseUrl: 'https://privx.example.com' });

        expect(await authorizer.accessToken()).toBe('token-1');
        vi.advanceTimersByTime(31_000); // 60s lifetime minus 30s skew
        expect(await authorizer.accessToken()).toBe('token-2');
      } finally {
        vi.useRealTimers();
      }
    });

    it('should share one in-flight grant between concurrent callers', async () => {
      mockFetch.mockImplementation(async () => tokenResponse({ access_token: 'token-1', expires_in: 300 }));
      const authorizer = new PasswordGrantAuthorizer(credential, { baseUrl: 'https://privx.example.com' });

      const tokens = await Promise.all([authorizer.accessToken(), authorizer.accessToken()]);

      expect(tokens).toEqual(['token-1', 'token-1']);
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should not cache a token without a lifetime', async () => {
      mockFetch.mockImplementation(async () => tokenResponse({ access_token: 'token-1' }));
      const authorizer = new PasswordGrantAuthorizer(credential, { baseUrl: 'https://privx.example.com' });

      await authorizer.accessToken();
      await authorizer.accessToken();

      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('should grant again after invalidate()', async () => {
      mockFetch.mockImplementation(async () => tokenResponse({ access_token: 'token-1', expires_in: 300 }));
      const authorizer = new PasswordGrantAuthorizer(credential, { baseUrl: 'https://privx.example.com' });

      await authorizer.accessToken();
      authorizer.invalidate();
      await authorizer.accessToken();

      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('should surface the endpoint error description', async () => {
      mockFetch.mockResolvedValueOnce(
        tokenResponse({ error: 'invalid_grant', error_description: 'bad credentials' }, 400)
      );
      const authorizer = new PasswordGrantAuthorizer(credential, { baseUrl: 'https://privx.example.com' });

      await expect(authorizer.accessToken()).rejects.toMatchObject({
        code: 'AUTHENTICATION_FAILED',
        statusCode: 400,
        message: 'Authentication failed: bad credentials',
      });
    });

    it('should fail when the response has no access token', async () => {
      mockFetch.mockResolvedValueOnce(tokenResponse({ token_type: 'Bearer' }));
      const authorizer = new PasswordGrantAuthorizer(credential, { baseUrl: 'https://privx.example.com' });

      await expect(authorizer.accessToken()).rejects.toMatchObject({
        code: 'AUTHENTICATION_FAILED',
        message: 'Authentication failed: token endpoint returned no access_token',
      });
    });

    it('should map network failures to TRANSPORT_ERROR', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));
      const authorizer = new PasswordGrantAuthorizer(credential, { baseUrl: 'https://privx.example.com' });

      await expect(authorizer.accessToken()).rejects.toMatchObject({
        code: 'TRANSPORT_ERROR',
        message: 'POST /auth/api/v1/oauth/token: network error: fetch failed',
      });
    });
  });
});
