// src/index.ts

export { ZenMoneyClient } from './sdk';
export type { CoreDeps } from './sdk';
export { OAuth2Client } from './core/auth/OAuth2Client';
export type { Token, TokenInput, AuthState, OAuth2Config } from './core/auth/types';
export { HttpCore } from './core/http/HttpCore';
export { Logger } from './observability/Logger';
export type { LoggerConfig } from './observability/Logger';
export { MetricsCollector } from './observability/MetricsCollector';
export type { MetricsConfig } from './observability/MetricsCollector';
export {
  validateConfig,
  validateConfigSafe,
  loadConfigFromEnv,
  DEFAULT_API_BASE_URL,
  DEFAULT_AUTHORIZATION_ENDPOINT,
  DEFAULT_TOKEN_ENDPOINT,
} from './config/ConfigValidator';
export type { ZenMoneyConfig, ResolvedConfig } from './config/ConfigValidator';

export type {
  Instrument,
  Company,
  User,
  Account,
  AccountType,
  Tag,
  Merchant,
  Reminder,
  ReminderMarker,
  ReminderMarkerState,
  Transaction,
  Budget,
  Deletion,
  EntityKind,
  DiffPayload,
  DiffResponse,
  SuggestRequest,
  SuggestResponse,
} from './core/models/types';
export * as schemas from './core/models/schemas';
export { ZodSchemaValidator, parseEntity } from './core/models/ModelValidator';
export type { SchemaValidator } from './core/models/ModelValidator';

// Export error classes for error handling
export {
  SDKError,
  ConfigError,
  TransportError,
  TransportTimeoutError,
  AuthorizationError,
  NotAuthenticatedError,
  ApiError,
  ValidationError,
} from './utils/errors';
