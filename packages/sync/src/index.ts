/**
 * @catalog-sync/sync - Offline-first sync engine for the media catalog
 *
 * Keeps a local replica of server-owned books, series and contributors in
 * step with the catalog server while the user keeps editing offline.
 *
 * ## Architecture
 *
 * ```
 * ┌─────────────────────────────────────────────────────────────────────┐
 * │                          SyncCoordinator                            │
 * │   status$ · sync() · forceFullSync() · resolveConflict()            │
 * │                                                                     │
 * │  ┌────────────────┐  ┌────────────────┐  ┌───────────────────────┐  │
 * │  │ Pull           │  │ Push           │  │ Event Stream          │  │
 * │  │ Orchestrator   │  │ Orchestrator   │  │ Processor             │  │
 * │  │ (delta pages)  │  │ (FIFO queue)   │  │ (live events)         │  │
 * │  └───────┬────────┘  └───────┬────────┘  └──────────┬────────────┘  │
 * │          └───────── SyncMutex + Conflict Detector ──┘               │
 * └───────────────┬──────────────────────────────────────┬──────────────┘
 *                 ▼                                      ▼
 *          HttpCatalogApi                       WebSocketEventStream
 * ```
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createMemoryStorage } from '@catalog-sync/storage-memory';
 * import {
 *   createHttpCatalogApi,
 *   createSyncCoordinator,
 *   createWebSocketEventStream,
 * } from '@catalog-sync/sync';
 *
 * const storage = createMemoryStorage();
 * const coordinator = createSyncCoordinator({
 *   api: createHttpCatalogApi({ serverUrl, authToken }),
 *   eventStream: createWebSocketEventStream({ serverUrl, authToken }),
 *   stores: storage.entities,
 *   queue: storage.queue,
 *   checkpoints: storage.checkpoints,
 *   conflicts: storage.conflicts,
 *   libraryIdentity: storage.libraryIdentity,
 *   preferences: storage.preferences,
 * });
 *
 * await coordinator.sync();
 * ```
 *
 * ## Conflicts
 *
 * Server records never overwrite unsent local edits. A newer server
 * version flags the entity `conflict` and stores a `ConflictRecord`
 * for the user to settle with `resolveConflict(collection, id, choice)`.
 *
 * @packageDocumentation
 * @module @catalog-sync/sync
 */

export { createLinkedController, sleep } from './abort.js';
export { CheckpointManager, toCheckpointCursor, type SyncCheckpoint } from './checkpoint.js';
export {
  resolveSyncEngineConfig,
  validateConfig,
  type ResolvedSyncEngineConfig,
  type SyncEngineConfig,
} from './config.js';
export {
  applyServerDeletions,
  applyServerRecord,
  resolveConflict,
  type ConflictAction,
  type ConflictContext,
  type ConflictResolution,
  type ConflictTarget,
  type DeletionTarget,
} from './conflict.js';
export {
  EventStreamProcessor,
  type EventOutcome,
  type EventStreamProcessorOptions,
  type LifecycleEvent,
  type ProcessedEvent,
} from './event-processor.js';
export {
  LibraryIdentityVerifier,
  type LibraryIdentityVerifierOptions,
  type LibraryVerification,
} from './library-identity.js';
export { LocalChangeRecorder, generateOperationId, type LocalChangeRecorderOptions } from './local-changes.js';
export {
  createLogger,
  noopLogger,
  resolveLogger,
  type LogEntry,
  type LogLevel,
  type Logger,
  type LoggerOptions,
  type LoggerSetting,
} from './logger.js';
export {
  PullOrchestrator,
  type CollectionPullSummary,
  type PullOrchestratorOptions,
  type PullProgress,
  type PullProgressListener,
  type PullSummary,
} from './pull-orchestrator.js';
export {
  PushOrchestrator,
  type FlushSummary,
  type OperationEvent,
  type PushOrchestratorOptions,
} from './push-orchestrator.js';
export {
  DEFAULT_RETRY_POLICY,
  computeBackoffDelay,
  withRetry,
  type RetryOptions,
  type RetryPolicy,
} from './retry.js';
export {
  SyncCoordinator,
  createSyncCoordinator,
  type CatchUpResult,
  type ConflictChoice,
  type SyncCoordinatorOptions,
  type SyncOptions,
  type SyncResult,
} from './sync-coordinator.js';
export { SyncMutex } from './sync-mutex.js';
export {
  describeStatus,
  isSyncActive,
  phaseForCollection,
  progressStatus,
  type SyncPhase,
  type SyncStatus,
  type SyncStatusType,
} from './sync-status.js';
export * from './transport/index.js';
