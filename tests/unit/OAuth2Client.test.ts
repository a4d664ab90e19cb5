// tests/unit/OAuth2Client.test.ts

import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import nock from 'nock';
import { OAuth2Client } from '../../src/core/auth/OAuth2Client';
import type { MetricsCollector } from '../../src/observability/MetricsCollector';
import {
  ApiError,
  AuthorizationError,
  NotAuthenticatedError,
  TransportError,
  ValidationError,
} from '../../src/utils/errors';
import {
  API_ORIGIN,
  BASIC_AUTH,
  CLIENT_ID,
  CLIENT_SECRET,
  REDIRECT_URI,
  TOKEN_PATH,
  silentLogger,
  storedToken,
  testMetrics,
  tokenResponse,
} from '../helpers/fixtures';

function createClient(metrics: MetricsCollector): OAuth2Client {
  return new OAuth2Client(
    {
      clientId: CLIENT_ID,
      clientSecret: CLIENT_SECRET,
      redirectUri: REDIRECT_URI,
      authorizationEndpoint: `${API_ORIGIN}/oauth2/authorize/`,
      tokenEndpoint: `${API_ORIGIN}${TOKEN_PATH}`,
      timeout: 1000,
    },
    silentLogger(),
    metrics
  );
}

describe('OAuth2Client', () => {
  let metrics: MetricsCollector;
  let auth: OAuth2Client;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    nock.cleanAll();
    metrics = testMetrics();
    auth = createClient(metrics);
  });

  describe('authorizationUrl', () => {
    it('should point at the authorization endpoint with client id, redirect and state', () => {
      const url = new URL(auth.authorizationUrl('csrf-state'));

      expect(`${url.origin}${url.pathname}`).toBe(`${API_ORIGIN}/oauth2/authorize/`);
      expect(url.searchParams.get('client_id')).toBe(CLIENT_ID);
      expect(url.searchParams.get('response_type')).toBe('code');
      expect(url.searchParams.get('redirect_uri')).toBe(REDIRECT_URI);
      expect(url.searchParams.get('state')).toBe('csrf-state');
    });

    it('should never put the client secret in the URL', () => {
      expect(auth.authorizationUrl('csrf-state')).not.toContain(CLIENT_SECRET);
    });

    it('should pass extra parameters through', () => {
      const url = new URL(auth.authorizationUrl(undefined, { scope: 'read' }));

      expect(url.searchParams.get('scope')).toBe('read');
      expect(url.searchParams.has('state')).toBe(false);
    });

    it('should not touch token state or the network', () => {
      auth.authorizationUrl('csrf-state');

      expect(auth.getState()).toBe('unauthenticated');
      expect(nock.pendingMocks()).toEqual([]);
    });
  });

  describe('fetchToken', () => {
    it('should exchange the code with Basic client authentication and store the pair', async () => {
      const before = Math.floor(Date.now() / 1000);
      const scope = nock(API_ORIGIN)
        .post(
          TOKEN_PATH,
          (body) =>
            body.grant_type === 'authorization_code' &&
            body.code === 'test-code' &&
            body.redirect_uri === REDIRECT_URI
        )
        .matchHeader('Authorization', BASIC_AUTH)
        .reply(200, tokenResponse('1'));

      const token = await auth.fetchToken('test-code');

      expect(scope.isDone()).toBe(true);
      expect(token.access_token).toBe('test-access-1');
      expect(token.refresh_token).toBe('test-refresh-1');
      expect(token.token_type).toBe('bearer');
      expect(token.expires_at).toBeGreaterThanOrEqual(before + 86400);
      expect(auth.getToken()).toBe(token);
      expect(auth.getState()).toBe('authenticated');
    });

    it('should reject an invalid code without touching the stored token', async () => {
      auth.setToken(storedToken('1'));
      const held = auth.getToken();
      nock(API_ORIGIN)
        .post(TOKEN_PATH)
        .reply(400, { error: 'invalid_grant', error_description: 'Code expired' });

      const error = await auth.fetchToken('expired-code').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthorizationError);
      if (error instanceof AuthorizationError) {
        expect(error.message).toBe('Token request rejected: invalid_grant');
        expect(error.status).toBe(400);
        expect(error.endpoint).toBe(`${API_ORIGIN}${TOKEN_PATH}`);
        expect(error.body).toEqual({ error: 'invalid_grant', error_description: 'Code expired' });
      }
      expect(auth.getToken()).toBe(held);
    });

    it('should reject an empty code without calling the token endpoint', async () => {
      const increment = vi.spyOn(metrics, 'incrementCounter');
      auth.setToken(storedToken('1'));
      const held = auth.getToken();

      const error = await auth.fetchToken('').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthorizationError);
      if (error instanceof AuthorizationError) {
        expect(error.message).toBe('Authorization code is required');
        expect(error.endpoint).toBe(`${API_ORIGIN}${TOKEN_PATH}`);
      }
      expect(auth.getToken()).toBe(held);
      expect(increment).not.toHaveBeenCalled();
    });

    it('should stay unauthenticated after an invalid code', async () => {
      nock(API_ORIGIN).post(TOKEN_PATH).reply(400, { error: 'invalid_grant' });

      await expect(auth.fetchToken('bad-code')).rejects.toBeInstanceOf(AuthorizationError);
      expect(auth.getState()).toBe('unauthenticated');
    });

    it('should surface a token endpoint 5xx as ApiError', async () => {
      nock(API_ORIGIN).post(TOKEN_PATH).reply(500, { error: 'server_error' });

      const error = await auth.fetchToken('test-code').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      if (error instanceof ApiError) {
        expect(error.status).toBe(500);
      }
    });

    it('should surface connection failures as TransportError', async () => {
      nock(API_ORIGIN)
        .post(TOKEN_PATH)
        .replyWithError({ code: 'ECONNREFUSED', message: 'connect ECONNREFUSED' });

      await expect(auth.fetchToken('test-code')).rejects.toBeInstanceOf(TransportError);
    });

    it('should count token requests by grant', async () => {
      const increment = vi.spyOn(metrics, 'incrementCounter');
      nock(API_ORIGIN).post(TOKEN_PATH).reply(200, tokenResponse('1'));

      await auth.fetchToken('test-code');

      expect(increment).toHaveBeenCalledWith('token_requests_total', {
        grant: 'authorization_code',
        status: 'success',
      });
    });
  });

  describe('refreshToken', () => {
    beforeEach(() => {
      auth.setToken(storedToken('1'));
    });

    it('should replace both tokens', async () => {
      const scope = nock(API_ORIGIN)
        .post(
          TOKEN_PATH,
          (body) => body.grant_type === 'refresh_token' && body.refresh_token === 'test-refresh-1'
        )
        .matchHeader('Authorization', BASIC_AUTH)
        .reply(200, tokenResponse('2'));

      const token = await auth.refreshToken();

      expect(scope.isDone()).toBe(true);
      expect(token.access_token).toBe('test-access-2');
      expect(token.refresh_token).toBe('test-refresh-2');
      expect(auth.getAccessToken()).toBe('test-access-2');
    });

    it('should keep the old refresh token when the server does not rotate it', async () => {
      nock(API_ORIGIN)
        .post(TOKEN_PATH)
        .reply(200, { access_token: 'test-access-2', token_type: 'bearer', expires_in: 86400 });

      const token = await auth.refreshToken();

      expect(token.access_token).toBe('test-access-2');
      expect(token.refresh_token).toBe('test-refresh-1');
    });

    it('should swap the pair as a whole', async () => {
      const held = auth.getToken();
      nock(API_ORIGIN).post(TOKEN_PATH).reply(200, tokenResponse('2'));

      const pending = auth.refreshToken();
      // Mid-refresh readers still see the complete old pair
      expect(auth.getToken()).toBe(held);

      const token = await pending;

      expect(Object.isFrozen(token)).toBe(true);
      expect(held).toEqual(storedToken('1'));
      expect(auth.getToken()).toBe(token);
    });

    it('should send one token request for concurrent callers', async () => {
      const increment = vi.spyOn(metrics, 'incrementCounter');
      const scope = nock(API_ORIGIN).post(TOKEN_PATH).once().reply(200, tokenResponse('2'));

      const tokens = await Promise.all([auth.refreshToken(), auth.refreshToken(), auth.refreshToken()]);

      expect(scope.isDone()).toBe(true);
      expect(tokens[0]).toBe(tokens[1]);
      expect(tokens[1]).toBe(tokens[2]);
      expect(increment.mock.calls.filter(([name]) => name === 'token_refresh_dedup')).toHaveLength(2);
    });

    it('should start a new request once the previous refresh settled', async () => {
      nock(API_ORIGIN).post(TOKEN_PATH).reply(200, tokenResponse('2'));
      nock(API_ORIGIN)
        .post(TOKEN_PATH, (body) => body.refresh_token === 'test-refresh-2')
        .reply(200, tokenResponse('3'));

      await auth.refreshToken();
      const token = await auth.refreshToken();

      expect(token.access_token).toBe('test-access-3');
    });

    it('should not restore a token cleared while the refresh was in flight', async () => {
      nock(API_ORIGIN).post(TOKEN_PATH).reply(200, tokenResponse('2'));

      const pending = auth.refreshToken();
      auth.clearToken();
      const token = await pending;

      expect(token.access_token).toBe('test-access-2');
      expect(auth.getToken()).toBeNull();
      expect(auth.getState()).toBe('unauthenticated');
    });

    it('should keep a token set while the refresh was in flight', async () => {
      nock(API_ORIGIN).post(TOKEN_PATH).reply(200, tokenResponse('2'));

      const pending = auth.refreshToken();
      const replaced = auth.setToken(storedToken('9'));
      await pending;

      expect(auth.getToken()).toBe(replaced);
      expect(auth.getAccessToken()).toBe('test-access-9');
    });

    it('should require authorization again when the refresh token is rejected', async () => {
      nock(API_ORIGIN).post(TOKEN_PATH).reply(400, { error: 'invalid_grant' });

      await expect(auth.refreshToken()).rejects.toBeInstanceOf(AuthorizationError);

      expect(auth.getToken()).toBeNull();
      expect(auth.getState()).toBe('unauthenticated');
      expect(() => auth.getAccessToken()).toThrow(NotAuthenticatedError);
    });

    it('should keep the token when the token endpoint is unreachable', async () => {
      const held = auth.getToken();
      nock(API_ORIGIN)
        .post(TOKEN_PATH)
        .replyWithError({ code: 'ECONNREFUSED', message: 'connect ECONNREFUSED' });

      await expect(auth.refreshToken()).rejects.toBeInstanceOf(TransportError);

      expect(auth.getToken()).toBe(held);
    });

    it('should fail without a held token', async () => {
      auth.clearToken();

      await expect(auth.refreshToken()).rejects.toBeInstanceOf(NotAuthenticatedError);
    });
  });

  describe('refreshIfStale', () => {
    it('should return the current token when the rejected one was already replaced', async () => {
      auth.setToken(storedToken('2'));

      const token = await auth.refreshIfStale('test-access-1');

      expect(token.access_token).toBe('test-access-2');
      expect(nock.pendingMocks()).toEqual([]);
    });

    it('should refresh when the rejected token is still held', async () => {
      auth.setToken(storedToken('1'));
      nock(API_ORIGIN).post(TOKEN_PATH).reply(200, tokenResponse('2'));

      const token = await auth.refreshIfStale('test-access-1');

      expect(token.access_token).toBe('test-access-2');
    });
  });

  describe('token state', () => {
    it('should validate tokens given to setToken', () => {
      expect(() => auth.setToken({ access_token: '', refresh_token: 'test-refresh-1' })).toThrow(ValidationError);
      expect(auth.getState()).toBe('unauthenticated');
    });

    it('should default token_type and freeze the stored token', () => {
      const token = auth.setToken({ access_token: 'test-access-1', refresh_token: 'test-refresh-1' });

      expect(token).toEqual({ access_token: 'test-access-1', refresh_token: 'test-refresh-1', token_type: 'bearer' });
      expect(Object.isFrozen(token)).toBe(true);
    });

    it('should throw NotAuthenticatedError for the access token when none is held', () => {
      expect(() => auth.getAccessToken()).toThrow(NotAuthenticatedError);
    });

    it('should keep token state per instance', () => {
      const other = createClient(metrics);
      auth.setToken(storedToken('1'));

      expect(auth.isAuthenticated()).toBe(true);
      expect(other.isAuthenticated()).toBe(false);
    });
  });

  describe('createWithToken', () => {
    it('should start authenticated with the persisted token', () => {
      const client = OAuth2Client.createWithToken(
        { clientId: CLIENT_ID, clientSecret: CLIENT_SECRET, logging: { silent: true } },
        storedToken('1')
      );

      expect(client.getState()).toBe('authenticated');
      expect(client.getAccessToken()).toBe('test-access-1');
      expect(client.clientId).toBe(CLIENT_ID);
    });

    it('should start unauthenticated from create without a token', () => {
      const client = OAuth2Client.create({ clientId: CLIENT_ID, clientSecret: CLIENT_SECRET, logging: { silent: true } });

      expect(client.getState()).toBe('unauthenticated');
    });
  });
});
