// src/core/auth/OAuth2Client.ts

import { Issuer, custom, errors, type Client, type TokenSet } from 'openid-client';
import { TokenInputSchema } from './types';
import type { AuthState, GrantType, OAuth2Config, Token, TokenInput } from './types';
import type { ResolvedConfig, ZenMoneyConfig } from '../../config/ConfigValidator';
import { validateConfig } from '../../config/ConfigValidator';
import { ZodSchemaValidator } from '../models/ModelValidator';
import { Logger } from '../../observability/Logger';
import { MetricsCollector } from '../../observability/MetricsCollector';
import { withOAuthSpan } from '../../observability/tracing';
import {
  SDKError,
  ApiError,
  AuthorizationError,
  NotAuthenticatedError,
  TransportError,
  TransportTimeoutError,
} from '../../utils/errors';

const tokenValidator = new ZodSchemaValidator('Token', TokenInputSchema);

/**
 * OAuth2 authorization-code client for the ZenMoney token endpoint.
 *
 * Holds one token pair for the lifetime of the instance. The pair is replaced
 * as a whole, so readers see either the old or the new pair, never a mix.
 * Refreshes are single-flight: concurrent callers share one token request.
 */
export class OAuth2Client {
  private client: Client;
  private token: Readonly<Token> | null = null;
  private inFlightRefresh: Promise<Readonly<Token>> | null = null;
  private logger: Logger;
  private metrics: MetricsCollector;

  constructor(
    private config: OAuth2Config,
    logger: Logger,
    metrics: MetricsCollector
  ) {
    this.logger = logger;
    this.metrics = metrics;

    const issuer = new Issuer({
      issuer: new URL(config.tokenEndpoint).origin,
      authorization_endpoint: config.authorizationEndpoint,
      token_endpoint: config.tokenEndpoint,
      token_endpoint_auth_methods_supported: ['client_secret_basic'],
    });

    // ZenMoney authenticates clients on the token endpoint with HTTP Basic
    this.client = new issuer.Client({
      client_id: config.clientId,
      client_secret: config.clientSecret,
      redirect_uris: config.redirectUri ? [config.redirectUri] : undefined,
      response_types: ['code'],
      token_endpoint_auth_method: 'client_secret_basic',
    });

    const timeout = config.timeout;
    if (timeout) {
      this.client[custom.http_options] = (_url, options) => ({ ...options, timeout });
    }
  }

  /**
   * Build a client from user configuration, seeding the token when one is given
   *
   * @throws {ConfigError} If the configuration is invalid
   */
  static create(config: ZenMoneyConfig): OAuth2Client {
    const resolved = validateConfig(config);
    return OAuth2Client.fromResolvedConfig(
      resolved,
      new Logger(resolved.logging),
      new MetricsCollector(resolved.metrics)
    );
  }

  /**
   * Build a client pre-seeded with a token persisted from an earlier session,
   * skipping the authorization-code step.
   *
   * @example
   * ```typescript
   * const auth = OAuth2Client.createWithToken(
   *   { clientId: 'my-app', clientSecret: process.env.ZENMONEY_CLIENT_SECRET },
   *   JSON.parse(await fs.readFile('token.json', 'utf8'))
   * );
   * ```
   */
  static createWithToken(config: Omit<ZenMoneyConfig, 'token'>, token: TokenInput): OAuth2Client {
    return OAuth2Client.create({ ...config, token });
  }

  static fromResolvedConfig(
    resolved: ResolvedConfig,
    logger: Logger,
    metrics: MetricsCollector
  ): OAuth2Client {
    const client = new OAuth2Client(
      {
        clientId: resolved.clientId,
        clientSecret: resolved.clientSecret,
        redirectUri: resolved.redirectUri,
        authorizationEndpoint: resolved.endpoints.authorization,
        tokenEndpoint: resolved.endpoints.token,
        timeout: resolved.http.timeout,
      },
      logger,
      metrics
    );

    if (resolved.token) {
      client.token = Object.freeze({ ...resolved.token });
    }
    return client;
  }

  get clientId(): string {
    return this.config.clientId;
  }

  /**
   * Build the URL the end user visits to grant access. Pure: no network, no state change.
   *
   * @param state - Opaque value echoed back on the redirect
   * @param extraParams - Additional query parameters (e.g. `scope`)
   */
  authorizationUrl(state?: string, extraParams: Record<string, string> = {}): string {
    // openid-client defaults scope to "openid"; ZenMoney takes no scope unless the caller asks
    return this.client.authorizationUrl({
      scope: undefined,
      ...extraParams,
      response_type: 'code',
      state,
    });
  }

  /**
   * Exchange an authorization code for a token pair and store it
   *
   * @throws {AuthorizationError} If the code is empty, invalid or expired; the stored token is untouched
   * @throws {TransportError} On network failure
   */
  async fetchToken(code: string): Promise<Readonly<Token>> {
    // openid-client skips the grant entirely without a code
    if (!code) {
      throw new AuthorizationError('Authorization code is required', {
        endpoint: this.config.tokenEndpoint,
      });
    }

    const token = await this.requestToken('authorization_code', async () => {
      const tokenSet = await this.client.oauthCallback(this.config.redirectUri, { code });
      return this.toToken(tokenSet);
    });

    this.token = token;
    this.logger.info('Token obtained', { clientId: this.config.clientId, expiresAt: token.expires_at });
    return token;
  }

  /**
   * Exchange the stored refresh token for a new pair. Concurrent calls share
   * one request to the token endpoint.
   *
   * @throws {NotAuthenticatedError} If no token is held
   * @throws {AuthorizationError} If the server rejects the refresh token; the instance
   *   returns to the unauthenticated state
   */
  async refreshToken(): Promise<Readonly<Token>> {
    if (this.inFlightRefresh) {
      this.metrics.incrementCounter('token_refresh_dedup');
      this.logger.debug('Refresh already in progress, waiting', { clientId: this.config.clientId });
      return this.inFlightRefresh;
    }

    const current = this.token;
    if (!current) {
      throw new NotAuthenticatedError('No refresh token held, authorization required');
    }

    const refresh = this.executeRefresh(current);
    this.inFlightRefresh = refresh;

    try {
      return await refresh;
    } finally {
      this.inFlightRefresh = null;
    }
  }

  /**
   * Refresh only if the stored access token is still the one that was
   * rejected. A caller racing a sibling that already refreshed gets the
   * sibling's token without another token request.
   */
  async refreshIfStale(rejectedAccessToken: string): Promise<Readonly<Token>> {
    const current = this.token;
    if (!this.inFlightRefresh && current && current.access_token !== rejectedAccessToken) {
      this.logger.debug('Token already refreshed by a concurrent request', {
        clientId: this.config.clientId,
      });
      return current;
    }
    return this.refreshToken();
  }

  getToken(): Readonly<Token> | null {
    return this.token;
  }

  /**
   * Replace the held token, e.g. with one reloaded from caller storage
   *
   * @throws {ValidationError} If the token is malformed
   */
  setToken(input: TokenInput): Readonly<Token> {
    const token = Object.freeze(tokenValidator.validate(input));
    this.token = token;
    return token;
  }

  clearToken(): void {
    this.token = null;
  }

  getState(): AuthState {
    return this.token ? 'authenticated' : 'unauthenticated';
  }

  isAuthenticated(): boolean {
    return this.token !== null;
  }

  /**
   * @throws {NotAuthenticatedError} If no token is held
   */
  getAccessToken(): string {
    if (!this.token) {
      throw new NotAuthenticatedError();
    }
    return this.token.access_token;
  }

  private async executeRefresh(current: Readonly<Token>): Promise<Readonly<Token>> {
    try {
      const token = await this.requestToken('refresh_token', async () => {
        const tokenSet = await this.client.refresh(current.refresh_token);
        // The server may rotate the refresh token; keep the old one only if it did not send one
        return this.toToken(tokenSet, current.refresh_token);
      });

      // The caller replaced or cleared the token while the request was in flight
      if (this.token !== current) {
        this.logger.debug('Token changed during refresh, discarding refreshed token', {
          clientId: this.config.clientId,
        });
        return token;
      }

      this.token = token;
      this.logger.info('Token refreshed', { clientId: this.config.clientId, expiresAt: token.expires_at });
      return token;
    } catch (error: unknown) {
      // A rejected refresh token cannot be used again: require re-authorization
      if (error instanceof AuthorizationError && this.token === current) {
        this.token = null;
        this.logger.warn('Refresh token rejected, re-authorization required', {
          clientId: this.config.clientId,
          status: error.status,
        });
      }
      throw error;
    }
  }

  private async requestToken(
    grant: GrantType,
    exchange: () => Promise<Readonly<Token>>
  ): Promise<Readonly<Token>> {
    return withOAuthSpan(grant, this.config.clientId, async () => {
      const startTime = Date.now();

      try {
        const token = await exchange();

        this.metrics.incrementCounter('token_requests_total', { grant, status: 'success' });
        this.metrics.recordLatency('token_request_duration', Date.now() - startTime, {
          grant,
          status: 'success',
        });
        return token;
      } catch (error: unknown) {
        const classified = this.classifyError(error, grant);

        this.metrics.incrementCounter('token_requests_total', { grant, status: 'failed' });
        this.metrics.recordLatency('token_request_duration', Date.now() - startTime, {
          grant,
          status: 'failed',
        });
        this.logger.error('Token request failed', {
          grant,
          clientId: this.config.clientId,
          error: classified.message,
          code: classified.code,
        });

        throw classified;
      }
    });
  }

  private toToken(tokenSet: TokenSet, fallbackRefreshToken?: string): Readonly<Token> {
    return Object.freeze(
      tokenValidator.validate({
        access_token: tokenSet.access_token,
        refresh_token: tokenSet.refresh_token ?? fallbackRefreshToken,
        token_type: tokenSet.token_type,
        expires_at: tokenSet.expires_at,
      })
    );
  }

  private classifyError(error: unknown, grant: GrantType): SDKError {
    const endpoint = this.config.tokenEndpoint;

    if (error instanceof SDKError) {
      return error;
    }

    if (error instanceof errors.OPError) {
      const status = error.response?.statusCode;
      const body = { error: error.error, error_description: error.error_description };

      if (status !== undefined && status >= 500) {
        return new ApiError(`Token endpoint error: ${status}`, status, endpoint, body, { grant });
      }
      return new AuthorizationError(`Token request rejected: ${error.error}`, {
        status,
        endpoint,
        body,
        grant,
      });
    }

    if (error instanceof errors.RPError) {
      const status = error.response?.statusCode;
      if (status !== undefined) {
        return new ApiError(`Unexpected token endpoint response: ${error.message}`, status, endpoint, undefined, {
          grant,
        });
      }
      if (/timed out/i.test(error.message)) {
        return new TransportTimeoutError('Token request timeout', { endpoint, grant });
      }
    }

    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(`Token request failed: ${message}`, { endpoint, grant, cause: error });
  }
}
