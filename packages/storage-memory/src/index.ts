/**
 * @packageDocumentation
 *
 * In-memory persistence for the catalog sync engine.
 *
 * Keeps entities, pending operations, checkpoints, conflicts, the library
 * identity and preferences in process memory. Used by the engine's tests and
 * by applications that only need an ephemeral session.
 *
 * ```typescript
 * import { createMemoryStorage } from '@catalog-sync/storage-memory';
 * import { createSyncCoordinator } from '@catalog-sync/sync';
 *
 * const storage = createMemoryStorage();
 * const coordinator = createSyncCoordinator({
 *   api,
 *   stores: storage.entities,
 *   queue: storage.queue,
 *   checkpoints: storage.checkpoints,
 *   conflicts: storage.conflicts,
 *   libraryIdentity: storage.libraryIdentity,
 *   preferences: storage.preferences,
 * });
 * ```
 *
 * Data is lost when the process ends.
 *
 * @module @catalog-sync/storage-memory
 */
export * from './adapter.js';
export * from './entity-store.js';
export * from './metadata-stores.js';
export * from './operation-queue.js';
