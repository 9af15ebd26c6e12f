import type { EntityCollection, ServerRecord } from './entity.js';
import type { PendingOperation } from './operation.js';

export interface FetchChangesParams {
  /** Page size */
  limit: number;
  /** Opaque page cursor from the previous page; null for the first page */
  cursor: string | null;
  /** Checkpoint of the last successful pull; null requests everything */
  updatedAfter: string | null;
}

/**
 * One page of changes for a collection
 */
export interface ChangesPage {
  records: ServerRecord[];
  /** Ids removed on the server since `updatedAfter` */
  deletedIds: string[];
  nextCursor: string | null;
  hasMore: boolean;
}

/**
 * Server answer to a pushed operation.
 *
 * Transient and authentication failures are thrown as `ConnectionError`
 * instead of being returned.
 */
export type PushResult =
  | { status: 'ok'; serverVersion: number | null }
  | { status: 'conflict'; serverVersion: number; record: ServerRecord | null }
  | { status: 'rejected'; statusCode: number; code: string; message: string };

/**
 * Per-collection entity counts reported by the server
 */
export interface SyncManifest {
  libraryId: string | null;
  counts: Partial<Record<EntityCollection, number>>;
}

/**
 * Remote catalog API used by the sync engine
 */
export interface CatalogApi {
  fetchChanges(
    collection: EntityCollection,
    params: FetchChangesParams,
    signal?: AbortSignal
  ): Promise<ChangesPage>;
  push(operation: PendingOperation, signal?: AbortSignal): Promise<PushResult>;
  getManifest(signal?: AbortSignal): Promise<SyncManifest>;
  getLibraryId(signal?: AbortSignal): Promise<string>;
  getPreferences(signal?: AbortSignal): Promise<Record<string, unknown>>;
}

/**
 * Hook into the embedding application's authentication layer
 */
export interface SessionController {
  clearCredentials(reason: string): Promise<void>;
}
