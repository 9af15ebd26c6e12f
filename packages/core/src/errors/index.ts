/**
 * Catalog sync error system
 *
 * @example
 * ```typescript
 * import { ConnectionError } from '@catalog-sync/core';
 *
 * const result = await coordinator.forceFullSync();
 * if (!result.success && result.error instanceof ConnectionError && result.error.isAuthFailure) {
 *   await signOut();
 * }
 * ```
 *
 * @module errors
 */

export { ERROR_CODES, getErrorCategory, type ErrorCategory, type ErrorCode } from './error-codes.js';

export {
  CatalogError,
  ConfigurationError,
  ConnectionError,
  InvalidResponseError,
  LibraryMismatchError,
  RequestRejectedError,
  StorageError,
  type CatalogErrorOptions,
} from './catalog-error.js';

export { isCancellation, isServerUnreachableError, isTransientError } from './classify.js';
