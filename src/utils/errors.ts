// src/utils/errors.ts

export class SDKError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

// Network errors
export class TransportError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSPORT_ERROR', details);
  }
}

export class TransportTimeoutError extends TransportError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'TRANSPORT_TIMEOUT';
  }
}

// Authorization errors
export class AuthorizationError extends SDKError {
  public status?: number;
  public endpoint?: string;
  public body?: unknown;

  constructor(
    message: string,
    details: Record<string, unknown> & { status?: number; endpoint?: string; body?: unknown } = {}
  ) {
    super(message, 'AUTHORIZATION_ERROR', details);
    this.status = details.status;
    this.endpoint = details.endpoint;
    this.body = details.body;
  }
}

export class NotAuthenticatedError extends AuthorizationError {
  constructor(message: string = 'No token held, authorization required', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NOT_AUTHENTICATED';
  }
}

// API errors
export class ApiError extends SDKError {
  constructor(
    message: string,
    public status: number,
    public endpoint: string,
    public body?: unknown,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status, endpoint, body });
  }
}

// Schema errors
export class ValidationError extends SDKError {
  constructor(
    message: string,
    public issues: string[] = [],
    details?: Record<string, unknown>
  ) {
    super(message, 'VALIDATION_ERROR', { ...details, issues });
  }
}

export function isAuthorizationError(error: unknown): error is AuthorizationError {
  return error instanceof AuthorizationError;
}
