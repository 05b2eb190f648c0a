// src/core/errors.ts

export enum ErrorCode {
  RATE_LIMITED = 'rate_limited',
  NETWORK_ERROR = 'network_error',
  API_ERROR = 'api_error',
  AUTH_FAILED = 'auth_failed',
  CONFIG_ERROR = 'config_error',
  STATE_CORRUPT = 'state_corrupt',
  NOTHING_TO_RESUME = 'nothing_to_resume',
  JOB_IN_PROGRESS = 'job_in_progress',
  JOB_LOCKED = 'job_locked',
  CANCELLED = 'cancelled',
}

/** Closed set of categories recorded in a job's error log. */
export enum ErrorKind {
  RateLimited = 'rateLimited',
  NotFound = 'notFound',
  NotAccessible = 'notAccessible',
  AuthFailure = 'authFailure',
  ConfigurationError = 'configurationError',
  Unknown = 'unknown',
}

const NOT_FOUND_CODES = new Set(['thread_not_found', 'channel_not_found', 'message_not_found']);
const NOT_ACCESSIBLE_CODES = new Set(['not_in_channel', 'access_denied', 'is_archived']);
const AUTH_CODES = new Set(['invalid_auth', 'not_authed', 'account_inactive', 'token_revoked']);

export function errorKindFor(remoteCode: string): ErrorKind {
  if (remoteCode === 'ratelimited') return ErrorKind.RateLimited;
  if (NOT_FOUND_CODES.has(remoteCode)) return ErrorKind.NotFound;
  if (NOT_ACCESSIBLE_CODES.has(remoteCode)) return ErrorKind.NotAccessible;
  if (AUTH_CODES.has(remoteCode)) return ErrorKind.AuthFailure;
  return ErrorKind.Unknown;
}

/** Thread errors that can never succeed on retry. */
export function isPermanentThreadError(remoteCode: string): boolean {
  const kind = errorKindFor(remoteCode);
  return kind === ErrorKind.NotFound || kind === ErrorKind.NotAccessible;
}

export class VaultError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'VaultError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
    Object.setPrototypeOf(this, VaultError.prototype);
  }
}

export interface ErrorReport {
  code: ErrorCode | 'unexpected';
  message: string;
  retryable: boolean;
  suggestion?: string;
}

export function toErrorReport(error: unknown): ErrorReport {
  if (error instanceof VaultError) {
    return {
      code: error.code,
      message: error.message,
      retryable: error.retryable,
      suggestion: error.suggestion,
    };
  }

  return {
    code: 'unexpected',
    message: error instanceof Error ? error.message : String(error),
    retryable: false,
  };
}
