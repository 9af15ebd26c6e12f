import { CatalogError, StorageError, isCancellation } from '@catalog-sync/core';
import { toError } from './logger.js';

/**
 * Run local store work and report a store failure as a {@link StorageError}.
 *
 * Catalog errors and cancellation pass through unchanged.
 *
 * @example
 * ```typescript
 * await guardStorage('Applying books page', { collection: 'books' }, () => store.upsertAll(entities));
 * ```
 */
export async function guardStorage<T>(
  action: string,
  context: Record<string, unknown>,
  work: () => Promise<T>
): Promise<T> {
  try {
    return await work();
  } catch (error) {
    if (error instanceof CatalogError || isCancellation(error)) throw error;
    const cause = toError(error);
    throw new StorageError(`${action} failed: ${cause.message}`, { context, cause });
  }
}
