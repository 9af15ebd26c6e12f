import { ERROR_CODES, getErrorCategory, type ErrorCategory, type ErrorCode } from './error-codes.js';

export interface CatalogErrorOptions {
  /** Replaces the default message of the code */
  message?: string;
  context?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Base class of every error raised by the sync engine.
 *
 * `suggestion` is the user-facing hint registered for `code` in
 * {@link ERROR_CODES}.
 *
 * @example
 * ```typescript
 * if (result.error instanceof CatalogError && result.error.category === 'connection') {
 *   showOfflineBanner(result.error.suggestion);
 * }
 * ```
 */
export class CatalogError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly suggestion: string;
  readonly context: Record<string, unknown>;

  constructor(code: ErrorCode, options: CatalogErrorOptions = {}) {
    const registered = ERROR_CODES[code];
    super(options.message ?? registered.message, options.cause ? { cause: options.cause } : undefined);
    this.name = 'CatalogError';
    this.code = code;
    this.category = getErrorCategory(code);
    this.suggestion = registered.suggestion;
    this.context = options.context ?? {};
  }
}

/**
 * Network, timeout, server and authentication failures.
 *
 * `retryable` is true for failures that may succeed on a later attempt
 * (network, timeout, 5xx, 408, 429) and false for authentication failures.
 */
export class ConnectionError extends CatalogError {
  readonly retryable: boolean;
  /** HTTP status of the response; absent when no response arrived */
  readonly statusCode?: number;

  constructor(
    code: ErrorCode,
    message: string,
    options: {
      retryable: boolean;
      statusCode?: number;
      context?: Record<string, unknown>;
      cause?: Error;
    }
  ) {
    super(code, {
      message,
      context:
        options.statusCode === undefined ? { ...options.context } : { ...options.context, statusCode: options.statusCode },
      cause: options.cause,
    });
    this.name = 'ConnectionError';
    this.retryable = options.retryable;
    this.statusCode = options.statusCode;
  }

  /** True for 401 and 403 responses */
  get isAuthFailure(): boolean {
    return this.code === 'CATALOG_C501';
  }
}

/**
 * The server refused a request permanently (4xx other than 401/403/409)
 */
export class RequestRejectedError extends CatalogError {
  readonly statusCode: number;
  readonly serverCode: string;

  constructor(statusCode: number, serverCode: string, message: string, context?: Record<string, unknown>) {
    super('CATALOG_C504', { message, context: { ...context, statusCode, serverCode } });
    this.name = 'RequestRejectedError';
    this.statusCode = statusCode;
    this.serverCode = serverCode;
  }
}

/**
 * A local store failed to read or write. Never retried.
 */
export class StorageError extends CatalogError {
  constructor(message: string, options: { context?: Record<string, unknown>; cause?: Error } = {}) {
    super('CATALOG_S300', { message, ...options });
    this.name = 'StorageError';
  }
}

/**
 * Wire data that fails validation
 */
export class InvalidResponseError extends CatalogError {
  /** Validation issues as `path: message` strings */
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], context?: Record<string, unknown>) {
    super('CATALOG_V100', { message, context: issues.length > 0 ? { ...context, issues } : context });
    this.name = 'InvalidResponseError';
    this.issues = issues;
  }
}

export class ConfigurationError extends CatalogError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CATALOG_V101', {
      message: issues.length > 0 ? `${message}: ${issues.join('; ')}` : message,
      context: { issues },
    });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * The server reports a different library than the one stored locally
 */
export class LibraryMismatchError extends CatalogError {
  readonly expected: string;
  readonly actual: string;
  readonly hasPendingChanges: boolean;

  constructor(expected: string, actual: string, hasPendingChanges: boolean) {
    super('CATALOG_C506', {
      message: `Server library "${actual}" does not match local library "${expected}"`,
      context: { expected, actual, hasPendingChanges },
    });
    this.name = 'LibraryMismatchError';
    this.expected = expected;
    this.actual = actual;
    this.hasPendingChanges = hasPendingChanges;
  }
}
