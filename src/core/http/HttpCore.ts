// src/core/http/HttpCore.ts

import axios, { type AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import type { HttpConfig, HttpRequestConfig } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import {
  ApiError,
  AuthorizationError,
  TransportError,
  TransportTimeoutError,
} from '../../utils/errors';
import { generateCorrelationId, withHttpSpan } from '../../observability/tracing';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Executes a single JSON request. Retry policy lives in the API client; this
 * layer only classifies failures.
 */
export class HttpCore {
  private axiosInstance: AxiosInstance;
  private metrics: MetricsCollector;
  private logger: Logger;

  constructor(config: HttpConfig, metrics: MetricsCollector, logger: Logger) {
    this.metrics = metrics;
    this.logger = logger;

    const keepAlive = config.keepAlive ?? true;
    this.axiosInstance = axios.create({
      baseURL: config.baseURL,
      timeout: config.timeout ?? 30000,
      httpAgent: new http.Agent({ keepAlive }),
      httpsAgent: new https.Agent({ keepAlive }),
    });
  }

  async get<T = unknown>(url: string, token?: string): Promise<T> {
    return this.request<T>({ url, method: 'GET', token });
  }

  async post<T = unknown>(url: string, body: unknown, token?: string): Promise<T> {
    return this.request<T>({ url, method: 'POST', body, token });
  }

  async request<T = unknown>(config: HttpRequestConfig): Promise<T> {
    const requestId = generateCorrelationId();
    const method = config.method ?? 'GET';
    const endpoint = config.url;

    const headers: Record<string, string> = {
      Accept: 'application/json',
      'X-Request-ID': requestId,
      'User-Agent': 'zenmoney-sdk/1.0',
      ...config.headers,
    };
    if (config.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (config.token) {
      headers.Authorization = `Bearer ${config.token}`;
    }

    this.logger.debug('HTTP request', {
      requestId,
      endpoint,
      method,
      authenticated: Boolean(config.token),
    });

    return withHttpSpan(method, endpoint, requestId, async () => {
      const startTime = Date.now();

      try {
        const response = await this.axiosInstance.request<T>({
          url: config.url,
          method,
          headers,
          data: config.body,
          timeout: config.timeout,
        });

        this.metrics.incrementCounter('http_requests_total', {
          endpoint,
          method,
          status: response.status,
        });
        this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
          endpoint,
          status: response.status,
        });

        return response.data;
      } catch (error: unknown) {
        const status = axios.isAxiosError(error) ? (error.response?.status ?? 'error') : 'error';

        this.metrics.incrementCounter('http_requests_total', { endpoint, method, status });
        this.metrics.incrementCounter('http_errors', { endpoint, status });

        throw this.transformError(error, endpoint, requestId);
      }
    });
  }

  private transformError(error: unknown, endpoint: string, requestId: string): Error {
    if (!axios.isAxiosError(error)) {
      return new TransportError('Request failed', { endpoint, requestId, cause: error });
    }

    if (error.response) {
      const { status, data } = error.response;

      this.logger.debug('HTTP error response', {
        requestId,
        endpoint,
        status,
        statusText: error.response.statusText,
        data,
      });

      if (status === 401 || status === 403) {
        return new AuthorizationError(`Authorization failed: ${status}`, {
          status,
          endpoint,
          body: data,
          requestId,
        });
      }
      return new ApiError(`API error: ${status}`, status, endpoint, data, { requestId });
    }

    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return new TransportTimeoutError('Request timeout', { endpoint, requestId });
    }

    return new TransportError(`Network error: ${error.message}`, {
      endpoint,
      requestId,
      errorCode: error.code,
    });
  }
}
