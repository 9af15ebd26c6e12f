import { ConnectionError } from './catalog-error.js';

const UNREACHABLE_MESSAGES = [
  'econnrefused',
  'connection refused',
  'failed to connect',
  'no route to host',
  'host unreachable',
  'network is unreachable',
];

function* causeChain(error: unknown): Generator<unknown> {
  const seen = new Set<unknown>();
  let current: unknown = error;
  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    yield current;
    current = current instanceof Error ? current.cause : undefined;
  }
}

function errorText(error: unknown): string {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? ` ${error.code}` : '';
    return `${error.message}${code}`.toLowerCase();
  }
  return typeof error === 'string' ? error.toLowerCase() : '';
}

/**
 * True when the error, or any error in its `cause` chain, says the server
 * host could not be reached at all.
 */
export function isServerUnreachableError(error: unknown): boolean {
  for (const link of causeChain(error)) {
    const text = errorText(link);
    if (UNREACHABLE_MESSAGES.some((message) => text.includes(message))) {
      return true;
    }
  }
  return false;
}

/**
 * True when the operation was aborted through an AbortSignal
 */
export function isCancellation(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Whether a failed request may succeed if attempted again.
 *
 * Retryable {@link ConnectionError}s and unreachable-host failures are
 * transient. Authentication failures, rejections, malformed responses and
 * cancellations are not.
 */
export function isTransientError(error: unknown): boolean {
  if (isCancellation(error)) {
    return false;
  }
  for (const link of causeChain(error)) {
    if (link instanceof ConnectionError) {
      return link.retryable;
    }
  }
  return isServerUnreachableError(error);
}
