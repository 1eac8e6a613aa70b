import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('ofetch', () => {
  class FetchError extends Error {
    status?: number;
    data?: unknown;
    constructor(message: string) {
      super(message);
      this.name = 'FetchError';
    }
  }
  return { FetchError, ofetch: vi.fn() };
});

import { ofetch, FetchError } from 'ofetch';
import { TokenProvider, TOKEN_PATH } from '../../src/services/token-provider.js';
import { CredentialStore } from '../../src/services/credential-store.js';
import { createClientConfig } from '../../src/services/config.js';
import {
  AuthenticationError,
  ExpiryFormatError,
  TransientNetworkError,
} from '../../src/lib/errors.js';
import type { ClientConfig } from '../../src/types/config.js';

const EXPIRES_AT_TEXT = '01/15/2030 10:30:00';
const EXPIRES_AT_MS = Date.UTC(2030, 0, 15, 10, 30, 0);

function httpError(status: number, data?: unknown): FetchError {
  return Object.assign(new FetchError(`HTTP ${status}`), { status, data });
}

describe('TokenProvider', () => {
  let config: ClientConfig;
  let store: CredentialStore;
  let provider: TokenProvider;

  beforeEach(() => {
    vi.mocked(ofetch).mockReset();
    config = createClientConfig({
      baseUrl: 'https://nac.test/',
      clientId: 'test-client-id',
      clientSecret: 'test-secret',
      grantType: 'client_credentials',
      tokenExpiryTimezone: 'utc',
    });
    store = new CredentialStore();
    provider = new TokenProvider(config, store);
  });

  it('should post form-encoded client credentials to the token endpoint', async () => {
    vi.mocked(ofetch).mockResolvedValueOnce(
      JSON.stringify({ access_token: 'test-token', expires_at: EXPIRES_AT_TEXT })
    );

    await provider.acquire();

    expect(ofetch).toHaveBeenCalledTimes(1);
    expect(ofetch).toHaveBeenCalledWith(`https://nac.test${TOKEN_PATH}`, {
      method: 'POST',
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: 'client_id=test-client-id&client_secret=test-secret&grant_type=client_credentials',
      responseType: 'text',
      timeout: 30000,
      retry: 0,
    });
  });

  it('should return the credential and write it to the store', async () => {
    vi.mocked(ofetch).mockResolvedValueOnce(
      JSON.stringify({ access_token: 'test-token', expires_at: EXPIRES_AT_TEXT })
    );

    const credential = await provider.acquire();

    expect(credential).toEqual({ accessToken: 'test-token', expiresAt: EXPIRES_AT_MS });
    expect(store.get()).toEqual({ accessToken: 'test-token', expiresAt: EXPIRES_AT_MS });
  });

  it('should parse ISO expiries when configured', async () => {
    provider = new TokenProvider(
      createClientConfig({ ...config, tokenExpiryFormat: 'ISO' }),
      store
    );
    vi.mocked(ofetch).mockResolvedValueOnce(
      JSON.stringify({ access_token: 'test-token', expires_at: '2030-01-15T10:30:00Z' })
    );

    await expect(provider.acquire()).resolves.toEqual({ accessToken: 'test-token', expiresAt: EXPIRES_AT_MS });
  });

  it('should raise AuthenticationError with status and body when rejected', async () => {
    vi.mocked(ofetch).mockRejectedValueOnce(httpError(401, '{"error":"invalid_client"}'));

    const error = await provider.acquire().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthenticationError);
    if (error instanceof AuthenticationError) {
      expect(error.status).toBe(401);
      expect(error.body).toBe('{"error":"invalid_client"}');
      expect(error.message).toBe('Token request rejected with status 401: {"error":"invalid_client"}');
    }
    expect(store.get()).toBeNull();
  });

  it('should not retry a rejected token request', async () => {
    vi.mocked(ofetch).mockRejectedValueOnce(httpError(500, 'oops'));

    await expect(provider.acquire()).rejects.toBeInstanceOf(AuthenticationError);
    expect(ofetch).toHaveBeenCalledTimes(1);
  });

  it('should surface a connection failure as TransientNetworkError after one attempt', async () => {
    vi.mocked(ofetch).mockRejectedValueOnce(new TypeError('fetch failed'));

    const error = await provider.acquire().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientNetworkError);
    if (error instanceof TransientNetworkError) {
      expect(error.attempts).toBe(1);
    }
    expect(ofetch).toHaveBeenCalledTimes(1);
  });

  it('should reject a body that is not JSON', async () => {
    vi.mocked(ofetch).mockResolvedValueOnce('<html>gateway</html>');

    await expect(provider.acquire()).rejects.toMatchObject({
      code: 'AUTH_FAILED',
      message: 'Token response is not valid JSON: <html>gateway</html>',
    });
  });

  it('should reject a response without access_token', async () => {
    vi.mocked(ofetch).mockResolvedValueOnce(JSON.stringify({ expires_at: EXPIRES_AT_TEXT }));

    await expect(provider.acquire()).rejects.toMatchObject({
      message: `Token response is missing access_token: {"expires_at":"${EXPIRES_AT_TEXT}"}`,
    });
  });

  it('should reject an empty access_token', async () => {
    const body = JSON.stringify({ access_token: '', expires_at: EXPIRES_AT_TEXT });
    vi.mocked(ofetch).mockResolvedValueOnce(body);

    await expect(provider.acquire()).rejects.toMatchObject({
      message: `Token response is missing access_token: ${body}`,
    });
    expect(store.get()).toBeNull();
  });

  it('should not leak the token when expires_at is missing', async () => {
    vi.mocked(ofetch).mockResolvedValueOnce(JSON.stringify({ access_token: 'test-token' }));

    const error = await provider.acquire().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthenticationError);
    if (error instanceof AuthenticationError) {
      expect(error.body).toBe('{"access_token":"[REDACTED]"}');
    }
    expect(store.get()).toBeNull();
  });

  it('should raise ExpiryFormatError for an unexpected expiry layout', async () => {
    vi.mocked(ofetch).mockResolvedValueOnce(
      JSON.stringify({ access_token: 'test-token', expires_at: '2030-01-15 10:30' })
    );

    const error = await provider.acquire().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExpiryFormatError);
    expect(store.get()).toBeNull();
  });
});
