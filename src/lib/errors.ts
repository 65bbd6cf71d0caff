/**
 * Error taxonomy for the sync engine
 */

import { SyncErrorKind } from './types';

export class SyncError extends Error {
  readonly kind: SyncErrorKind;

  constructor(kind: SyncErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = kind;
  }
}

/** Malformed data; the item is skipped and the run continues */
export class ValidationError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ValidationError', message, options);
  }
}

/** Webhook signature mismatch; the request is rejected without side effects */
export class AuthenticationError extends SyncError {
  constructor(message = 'Authentication failed') {
    super('AuthenticationError', message);
  }
}

export class TransientIOError extends SyncError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super('TransientIOError', message, options);
    this.status = status;
  }
}

export class PermanentIOError extends SyncError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super('PermanentIOError', message, options);
    this.status = status;
  }
}

/** Create raced with an existing resource; resolved by falling back to update */
export class ResourceConflictError extends SyncError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super('ResourceConflictError', message);
    this.status = status;
  }
}

/** The full issue or project listing could not be fetched; the run aborts */
export class DataSourceUnavailable extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DataSourceUnavailable', message, options);
  }
}

export class ConfigError extends SyncError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('ConfigError', `Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.issues = issues;
  }
}

const TRANSIENT_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE', 'UND_ERR_SOCKET']);

/**
 * Map an HTTP status onto the taxonomy
 */
export function classifyStatus(status: number, message: string): SyncError {
  if (status >= 500 || status === 408 || status === 429) {
    return new TransientIOError(message, status);
  }
  if (status === 409 || status === 412) {
    return new ResourceConflictError(message, status);
  }
  return new PermanentIOError(message, status);
}

function readProperty(value: unknown, key: string): unknown {
  if (typeof value === 'object' && value !== null && key in value) {
    return Reflect.get(value, key);
  }
  return undefined;
}

/**
 * Normalise anything thrown by a network library into a SyncError
 */
export function toSyncError(error: unknown, context: string): SyncError {
  if (error instanceof SyncError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : '';

  if (name === 'AbortError' || name === 'TimeoutError') {
    return new TransientIOError(`${context}: timed out`, undefined, { cause: error });
  }

  const status = readProperty(error, 'status');
  if (typeof status === 'number') {
    return classifyStatus(status, `${context}: HTTP ${status}`);
  }

  const code = readProperty(error, 'code') ?? readProperty(readProperty(error, 'cause'), 'code');
  if ((typeof code === 'string' && TRANSIENT_CODES.has(code)) || message === 'fetch failed') {
    return new TransientIOError(`${context}: ${message}`, undefined, { cause: error });
  }

  return new PermanentIOError(`${context}: ${message}`, undefined, { cause: error });
}

export function isRetryable(error: unknown): boolean {
  return error instanceof TransientIOError;
}

export function errorKind(error: unknown): SyncErrorKind {
  return error instanceof SyncError ? error.kind : 'PermanentIOError';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
