// src/config/ConfigValidator.ts

import { z } from 'zod';
import dotenv from 'dotenv';
import { TokenInputSchema } from '../core/auth/types';
import { ConfigError } from '../utils/errors';

export const DEFAULT_AUTHORIZATION_ENDPOINT = 'https://api.zenmoney.ru/oauth2/authorize/';
export const DEFAULT_TOKEN_ENDPOINT = 'https://api.zenmoney.ru/oauth2/token/';
export const DEFAULT_API_BASE_URL = 'https://api.zenmoney.ru/v8/';
export const DEFAULT_TIMEOUT_MS = 30000;

// Endpoint Configuration Schema
const EndpointsConfigSchema = z
  .object({
    authorization: z.string().url().default(DEFAULT_AUTHORIZATION_ENDPOINT),
    token: z.string().url().default(DEFAULT_TOKEN_ENDPOINT),
    api: z
      .string()
      .url()
      .default(DEFAULT_API_BASE_URL)
      // Relative endpoint paths resolve against the base, which needs a trailing slash
      .transform((url) => (url.endsWith('/') ? url : `${url}/`)),
  })
  .default({});

// HTTP Configuration Schema
const HttpConfigSchema = z
  .object({
    timeout: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    keepAlive: z.boolean().default(true),
  })
  .default({});

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
    silent: z.boolean().optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .optional();

export const ZenMoneyConfigSchema = z.object({
  clientId: z.string().min(1, 'clientId is required'),
  clientSecret: z.string().min(1, 'clientSecret is required'),
  redirectUri: z.string().url().optional(),
  token: TokenInputSchema.optional(),
  endpoints: EndpointsConfigSchema,
  http: HttpConfigSchema,
  logging: LoggerConfigSchema,
  metrics: MetricsConfigSchema,
});

/** Configuration as written by the caller */
export type ZenMoneyConfig = z.input<typeof ZenMoneyConfigSchema>;

/** Configuration after defaults are applied and the token is normalized */
export type ResolvedConfig = z.output<typeof ZenMoneyConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
}

/**
 * Validate client configuration and apply defaults
 *
 * @throws {ConfigError} If configuration is invalid; `details.issues` lists each failing path
 */
export function validateConfig(config: unknown): ResolvedConfig {
  const result = ZenMoneyConfigSchema.safeParse(config);

  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid ZenMoney configuration: ${issues.join('; ')}`, { issues });
  }

  return result.data;
}

/**
 * Validate configuration and return user-friendly errors
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: ResolvedConfig } | { success: false; errors: string[] } {
  const result = ZenMoneyConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatIssues(result.error) };
}

/**
 * Build a configuration from ZENMONEY_* environment variables, loading a .env
 * file first when one exists.
 *
 * @param options.path - .env file location (defaults to dotenv's lookup in cwd)
 */
export function loadConfigFromEnv(options: { path?: string } = {}): ResolvedConfig {
  dotenv.config({ path: options.path });

  const env = process.env;
  const level = env.ZENMONEY_LOG_LEVEL;

  return validateConfig({
    clientId: env.ZENMONEY_CLIENT_ID,
    clientSecret: env.ZENMONEY_CLIENT_SECRET,
    redirectUri: env.ZENMONEY_REDIRECT_URI || undefined,
    endpoints: {
      authorization: env.ZENMONEY_AUTHORIZATION_ENDPOINT || undefined,
      token: env.ZENMONEY_TOKEN_ENDPOINT || undefined,
      api: env.ZENMONEY_API_URL || undefined,
    },
    logging: level ? { level } : undefined,
  });
}
