// src/sdk.ts

import type { TokenInput } from './core/auth/types';
import type { DiffPayload, DiffResponse, SuggestRequest, SuggestResponse } from './core/models/types';
import type { ZenMoneyConfig } from './config/ConfigValidator';
import { OAuth2Client } from './core/auth/OAuth2Client';
import { HttpCore } from './core/http/HttpCore';
import {
  diffPayloadValidator,
  diffResponseValidator,
  suggestResponseValidator,
} from './core/models/ModelValidator';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { validateConfig } from './config/ConfigValidator';
import { isAuthorizationError, ValidationError } from './utils/errors';

const DIFF_ENDPOINT = 'diff/';
const SUGGEST_ENDPOINT = 'suggest/';

export interface CoreDeps {
  auth: OAuth2Client;
  http: HttpCore;
  logger: Logger;
  metrics: MetricsCollector;
}

type Attempt<T> = { ok: true; value: T } | { ok: false; error: unknown };

export class ZenMoneyClient {
  private core: CoreDeps;

  constructor(core: CoreDeps) {
    this.core = core;
  }

  /**
   * Create a ZenMoney API client
   *
   * @param config - Client credentials, optional token and endpoint overrides
   * @throws {ConfigError} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const client = ZenMoneyClient.create({
   *   clientId: process.env.ZENMONEY_CLIENT_ID,
   *   clientSecret: process.env.ZENMONEY_CLIENT_SECRET,
   *   redirectUri: 'http://localhost:8080/callback',
   * });
   *
   * const url = client.auth.authorizationUrl('csrf-state');
   * // ...user approves, redirect arrives with ?code=...
   * await client.auth.fetchToken(code);
   * const diff = await client.getDiff();
   * ```
   */
  static create(config: ZenMoneyConfig): ZenMoneyClient {
    const resolved = validateConfig(config);

    const logger = new Logger(resolved.logging);
    const metrics = new MetricsCollector(resolved.metrics);
    const auth = OAuth2Client.fromResolvedConfig(resolved, logger, metrics);
    const http = new HttpCore(
      {
        baseURL: resolved.endpoints.api,
        timeout: resolved.http.timeout,
        keepAlive: resolved.http.keepAlive,
      },
      metrics,
      logger
    );

    logger.debug('ZenMoney client created', {
      clientId: resolved.clientId,
      apiBaseUrl: resolved.endpoints.api,
      authenticated: auth.isAuthenticated(),
    });

    return new ZenMoneyClient({ auth, http, logger, metrics });
  }

  /**
   * Create a client with a token persisted from an earlier session
   */
  static createWithToken(config: Omit<ZenMoneyConfig, 'token'>, token: TokenInput): ZenMoneyClient {
    return ZenMoneyClient.create({ ...config, token });
  }

  /**
   * The OAuth2 client holding this instance's token
   */
  get auth(): OAuth2Client {
    return this.core.auth;
  }

  /**
   * Prometheus exposition text for this client's HTTP and token metrics
   */
  async getMetrics(): Promise<string> {
    return this.core.metrics.getMetrics();
  }

  /**
   * Exchange local changes for server changes
   *
   * Without arguments this requests a full pull: the body carries only
   * `currentClientTimestamp`. Sending the same non-empty local changes twice is
   * not safe; resend only changes the server has not acknowledged through the
   * returned `serverTimestamp`. Conflicts are resolved by the server.
   *
   * @param localChanges - Entities changed locally, plus the last known `serverTimestamp`
   * @returns Server changes since `serverTimestamp`, validated per entity kind
   * @throws {ValidationError} If `localChanges` or the response fails schema validation
   * @throws {AuthorizationError} If the request is still rejected after one refresh
   * @throws {ApiError} On any other non-2xx response
   * @throws {TransportError} On network failure
   */
  async getDiff(localChanges?: DiffPayload): Promise<DiffResponse> {
    const now = Math.floor(Date.now() / 1000);
    const body = localChanges
      ? diffPayloadValidator.validate({
          ...localChanges,
          currentClientTimestamp: localChanges.currentClientTimestamp ?? now,
        })
      : { currentClientTimestamp: now };

    const raw = await this.sendWithRefresh(DIFF_ENDPOINT, body);
    const response = diffResponseValidator.validate(raw);

    this.core.logger.debug('Diff received', {
      serverTimestamp: response.serverTimestamp,
      transactions: response.transaction?.length ?? 0,
    });
    return response;
  }

  /**
   * Get categorization hints (tag, merchant, payee) for one or more transactions
   *
   * @example
   * ```typescript
   * const hint = await client.suggest({ payee: 'McDonalds' });
   * console.log(hint.tag);
   * ```
   */
  async suggest(request: SuggestRequest): Promise<SuggestResponse>;
  async suggest(request: SuggestRequest[]): Promise<SuggestResponse[]>;
  async suggest(
    request: SuggestRequest | SuggestRequest[]
  ): Promise<SuggestResponse | SuggestResponse[]> {
    const raw = await this.sendWithRefresh(SUGGEST_ENDPOINT, request);

    if (Array.isArray(request)) {
      if (!Array.isArray(raw)) {
        throw new ValidationError('SuggestResponse failed schema validation', [
          '(root): Expected array for a batch request',
        ]);
      }
      // Responses pair with requests by position
      if (raw.length !== request.length) {
        throw new ValidationError('SuggestResponse failed schema validation', [
          `(root): Expected ${request.length} suggestions, received ${raw.length}`,
        ]);
      }
      return raw.map((item) => suggestResponseValidator.validate(item));
    }

    // A single request may be answered with a one-element batch
    if (Array.isArray(raw)) {
      if (raw.length !== 1) {
        throw new ValidationError('SuggestResponse failed schema validation', [
          `(root): Expected one suggestion, received ${raw.length}`,
        ]);
      }
      return suggestResponseValidator.validate(raw[0]);
    }
    return suggestResponseValidator.validate(raw);
  }

  /**
   * POST with the current token. On an authorization failure, refresh once and
   * retry once; a second authorization failure is returned to the caller.
   */
  private async sendWithRefresh(endpoint: string, body: unknown): Promise<unknown> {
    const accessToken = this.core.auth.getAccessToken();

    const first = await this.attempt(endpoint, body, accessToken);
    if (first.ok) {
      return first.value;
    }
    if (!isAuthorizationError(first.error)) {
      throw first.error;
    }

    this.core.logger.info('Authorization failed, refreshing token and retrying', {
      endpoint,
      status: first.error.status,
    });

    const refreshed = await this.core.auth.refreshIfStale(accessToken);
    this.core.metrics.incrementCounter('api_retries_total', { endpoint });

    const second = await this.attempt(endpoint, body, refreshed.access_token);
    if (second.ok) {
      return second.value;
    }
    throw second.error;
  }

  private async attempt(endpoint: string, body: unknown, token: string): Promise<Attempt<unknown>> {
    try {
      const value = await this.core.http.post(endpoint, body, token);
      return { ok: true, value };
    } catch (error: unknown) {
      return { ok: false, error };
    }
  }
}
