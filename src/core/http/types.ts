// src/core/http/types.ts

export type HttpMethod = 'GET' | 'POST';

export interface HttpRequestConfig {
  /** Absolute URL, or a path relative to the configured base URL */
  url: string;
  method?: HttpMethod;
  body?: unknown;
  /** Bearer access token */
  token?: string;
  headers?: Record<string, string>;
  timeout?: number;
}

export interface HttpConfig {
  baseURL: string;
  timeout?: number;
  keepAlive?: boolean;
}
