import {
  isCancellation,
  type CatalogApi,
  type LibraryIdentityStore,
  type PendingOperationQueue,
} from '@catalog-sync/core';
import { resolveLogger, toError, type Logger, type LoggerSetting } from './logger.js';

/**
 * Result of comparing the server's library with the stored one
 */
export type LibraryVerification =
  | { status: 'first-sync'; libraryId: string }
  | { status: 'verified'; libraryId: string }
  | { status: 'unreachable'; error: Error }
  | { status: 'mismatch'; expected: string; actual: string; hasPendingChanges: boolean };

export interface LibraryIdentityVerifierOptions {
  api: CatalogApi;
  store: LibraryIdentityStore;
  queue: PendingOperationQueue;
  logger?: LoggerSetting;
}

/**
 * Detects that the server now serves a different logical library than the
 * one the local replica was pulled from.
 *
 * An unreachable server is not a mismatch: the cycle goes on and fails
 * later on its own terms.
 */
export class LibraryIdentityVerifier {
  private readonly api: CatalogApi;
  private readonly store: LibraryIdentityStore;
  private readonly queue: PendingOperationQueue;
  private readonly logger: Logger;

  constructor(options: LibraryIdentityVerifierOptions) {
    this.api = options.api;
    this.store = options.store;
    this.queue = options.queue;
    this.logger = resolveLogger(options.logger, 'LibraryIdentityVerifier');
  }

  async verify(signal?: AbortSignal): Promise<LibraryVerification> {
    let actual: string;
    try {
      actual = await this.api.getLibraryId(signal);
    } catch (error) {
      if (isCancellation(error) || signal?.aborted) throw error;
      this.logger.warn('Could not read library id', { message: toError(error).message });
      return { status: 'unreachable', error: toError(error) };
    }

    const expected = await this.store.get();
    if (expected === null) {
      await this.store.set(actual);
      this.logger.info('Library identity stored', { libraryId: actual });
      return { status: 'first-sync', libraryId: actual };
    }

    if (expected === actual) {
      return { status: 'verified', libraryId: actual };
    }

    const hasPendingChanges = (await this.queue.count()) > 0;
    this.logger.warn('Library mismatch', { expected, actual, hasPendingChanges });
    return { status: 'mismatch', expected, actual, hasPendingChanges };
  }
}
