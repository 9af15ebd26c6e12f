/**
 * Codes read `CATALOG_<letter><number>`; the letter names the category:
 * V validation (1xx), S storage (3xx), C connection (5xx).
 */
export const ERROR_CODES = {
  CATALOG_V100: {
    message: 'Invalid server response',
    suggestion: 'The server returned data that does not match the sync protocol. Check the server version.',
  },
  CATALOG_V101: {
    message: 'Invalid configuration',
    suggestion: 'Check the options passed to the sync engine against their documented ranges.',
  },
  CATALOG_V102: {
    message: 'Invalid local change',
    suggestion: 'The change conflicts with an operation already queued for this entity.',
  },

  CATALOG_S300: {
    message: 'Local storage operation failed',
    suggestion: 'Check that the local store is available and not full.',
  },

  CATALOG_C500: {
    message: 'Network request failed',
    suggestion: 'Check the network connection and that the server URL is reachable.',
  },
  CATALOG_C501: {
    message: 'Authentication rejected',
    suggestion: 'The session is no longer valid. Sign in again to continue syncing.',
  },
  CATALOG_C502: {
    message: 'Server error',
    suggestion: 'The server failed to handle the request. The sync will be retried.',
  },
  CATALOG_C503: {
    message: 'Request timed out',
    suggestion: 'Increase the request timeout or check server load.',
  },
  CATALOG_C504: {
    message: 'Request rejected',
    suggestion: 'The server refused the change permanently. The local edit has been rolled back.',
  },
  CATALOG_C505: {
    message: 'Event stream connection failed',
    suggestion: 'Live updates are paused. They resume when the connection is re-established.',
  },
  CATALOG_C506: {
    message: 'Library mismatch',
    suggestion: 'The server hosts a different library. Reset local data before syncing.',
  },
} as const;

export type ErrorCode = keyof typeof ERROR_CODES;

export type ErrorCategory = 'validation' | 'storage' | 'connection';

export function getErrorCategory(code: ErrorCode): ErrorCategory {
  if (code.startsWith('CATALOG_V')) return 'validation';
  if (code.startsWith('CATALOG_S')) return 'storage';
  return 'connection';
}
