import {
  ENTITY_COLLECTIONS,
  LibraryMismatchError,
  isCancellation,
  toEntity,
  toPayload,
  type CatalogApi,
  type CheckpointStore,
  type ConflictRecord,
  type ConflictStore,
  type DerivedIndex,
  type EntityCollection,
  type EntityStore,
  type EntityStores,
  type EntityTypeMap,
  type EventStream,
  type LibraryIdentityStore,
  type OperationKind,
  type PendingOperation,
  type PendingOperationQueue,
  type PreferencesStore,
  type SessionController,
  type SyncableEntity,
} from '@catalog-sync/core';
import { BehaviorSubject, Subject, type Observable, type Subscription } from 'rxjs';
import { CheckpointManager, type SyncCheckpoint } from './checkpoint.js';
import { resolveSyncEngineConfig, type ResolvedSyncEngineConfig, type SyncEngineConfig } from './config.js';
import { EventStreamProcessor, type LifecycleEvent } from './event-processor.js';
import { LibraryIdentityVerifier } from './library-identity.js';
import { LocalChangeRecorder, generateOperationId } from './local-changes.js';
import { resolveLogger, toError, type Logger } from './logger.js';
import { PullOrchestrator, type PullSummary } from './pull-orchestrator.js';
import { PushOrchestrator, type FlushSummary, type OperationEvent } from './push-orchestrator.js';
import { withRetry, type RetryOptions } from './retry.js';
import { guardStorage } from './storage-guard.js';
import { SyncMutex } from './sync-mutex.js';
import { progressStatus, type SyncStatus } from './sync-status.js';

/**
 * Collaborators and settings of a {@link SyncCoordinator}
 */
export interface SyncCoordinatorOptions extends SyncEngineConfig {
  api: CatalogApi;
  stores: EntityStores;
  queue: PendingOperationQueue;
  checkpoints: CheckpointStore;
  conflicts: ConflictStore;
  libraryIdentity: LibraryIdentityStore;
  /** Where pulled user preferences are saved; skipped when absent */
  preferences?: PreferencesStore;
  /** Live event feed; connected after the first successful sync */
  eventStream?: EventStream;
  /** Told to drop credentials when the server revokes access */
  session?: SessionController;
  /** Rebuilt after every successful sync */
  derivedIndexes?: readonly DerivedIndex[];
  /** Share a mutex with other writers of the same stores */
  mutex?: SyncMutex;
}

export interface SyncOptions {
  signal?: AbortSignal;
}

export type SyncResult =
  | { success: true; timestamp: number; pull: PullSummary; push: FlushSummary }
  | { success: false; error: Error };

/**
 * Outcome of a background catch-up after the event stream reconnected
 */
export type CatchUpResult =
  | { status: 'completed'; push: FlushSummary; pull: PullSummary }
  | { status: 'skipped' }
  | { status: 'failed'; error: Error };

export type ConflictChoice = 'keep-local' | 'keep-server';

/**
 * Runs sync cycles and owns the public sync status.
 *
 * A cycle verifies the library identity, pulls every collection, pulls
 * preferences, flushes queued local changes, stores the cycle start as the
 * new checkpoint, rebuilds derived indexes and makes sure the event stream
 * is connected.
 *
 * ```
 * idle ──► syncing ──► progress / retrying ──► success | error | library-mismatch
 * ```
 *
 * Live events are applied as they arrive, serialized with the cycle by the
 * sync mutex. When the event stream reconnects, a catch-up (flush, then
 * pull) runs in the background without touching `status$`; a reconnect
 * during a catch-up queues one more. While the stream is connected, a local
 * change is pushed in the background as soon as it is recorded.
 *
 * @example
 * ```typescript
 * const coordinator = createSyncCoordinator({
 *   api: createHttpCatalogApi({ serverUrl, getAuthToken }),
 *   eventStream: createWebSocketEventStream({ serverUrl, authToken }),
 *   stores: storage.entities,
 *   queue: storage.queue,
 *   checkpoints: storage.checkpoints,
 *   conflicts: storage.conflicts,
 *   libraryIdentity: storage.libraryIdentity,
 * });
 *
 * coordinator.status$.subscribe((status) => render(describeStatus(status)));
 *
 * const result = await coordinator.sync();
 * if (!result.success && result.error instanceof LibraryMismatchError) {
 *   await confirmAndReset(result.error);
 * }
 * ```
 */
export class SyncCoordinator {
  private readonly config: ResolvedSyncEngineConfig;
  private readonly logger: Logger;
  private readonly api: CatalogApi;
  private readonly stores: Record<EntityCollection, EntityStore>;
  private readonly queue: PendingOperationQueue;
  private readonly conflicts: ConflictStore;
  private readonly libraryIdentity: LibraryIdentityStore;
  private readonly preferences: PreferencesStore | null;
  private readonly eventStream: EventStream | null;
  private readonly session: SessionController | null;
  private readonly derivedIndexes: readonly DerivedIndex[];
  private readonly mutex: SyncMutex;

  private readonly checkpointManager: CheckpointManager;
  private readonly verifier: LibraryIdentityVerifier;
  private readonly puller: PullOrchestrator;
  private readonly pusher: PushOrchestrator;
  private readonly recorder: LocalChangeRecorder;
  private readonly processor: EventStreamProcessor;

  private readonly status$$ = new BehaviorSubject<SyncStatus>({ type: 'idle' });
  private readonly catchUp$$ = new Subject<CatchUpResult>();
  private readonly lifetime = new AbortController();
  private readonly eventSubscription: Subscription | null;

  private activeSync: Promise<SyncResult> | null = null;
  private activeCatchUp: Promise<void> | null = null;
  private catchUpRequested = false;
  private activeFlush: Promise<void> | null = null;
  private flushRequested = false;
  /** Bumped whenever checkpoints are cleared; pulls started earlier must not advance them */
  private checkpointGeneration = 0;

  constructor(options: SyncCoordinatorOptions) {
    this.config = resolveSyncEngineConfig(options);
    this.logger = resolveLogger(options.logger, 'SyncCoordinator');
    this.api = options.api;
    this.stores = options.stores;
    this.queue = options.queue;
    this.conflicts = options.conflicts;
    this.libraryIdentity = options.libraryIdentity;
    this.preferences = options.preferences ?? null;
    this.eventStream = options.eventStream ?? null;
    this.session = options.session ?? null;
    this.derivedIndexes = options.derivedIndexes ?? [];
    this.mutex = options.mutex ?? new SyncMutex();

    const shared = {
      stores: this.stores,
      queue: this.queue,
      conflicts: this.conflicts,
      now: this.config.now,
    };

    this.checkpointManager = new CheckpointManager(options.checkpoints);
    this.verifier = new LibraryIdentityVerifier({
      api: this.api,
      store: this.libraryIdentity,
      queue: this.queue,
      logger: options.logger,
    });
    this.puller = new PullOrchestrator({
      ...shared,
      api: this.api,
      checkpoints: this.checkpointManager,
      mutex: this.mutex,
      config: this.config,
      logger: options.logger,
    });
    this.pusher = new PushOrchestrator({
      ...shared,
      api: this.api,
      maxAttempts: this.config.maxPushAttempts,
      logger: options.logger,
    });
    this.recorder = new LocalChangeRecorder(shared);
    this.processor = new EventStreamProcessor({
      ...shared,
      mutex: this.mutex,
      collections: this.config.collections,
      onReconnected: () => this.scheduleCatchUp(),
      onUserRevoked: (reason) => this.revokeSession(reason),
      logger: options.logger,
    });

    this.eventSubscription = this.eventStream ? this.processor.attach(this.eventStream.events$) : null;

    this.logger.debug('SyncCoordinator initialized', {
      collections: this.config.collections,
      pageSize: this.config.pageSize,
      eventStream: this.eventStream !== null,
    });
  }

  get status$(): Observable<SyncStatus> {
    return this.status$$.asObservable();
  }

  getStatus(): SyncStatus {
    return this.status$$.getValue();
  }

  get isSyncing(): boolean {
    return this.activeSync !== null;
  }

  /** Results of background catch-ups */
  get catchUp$(): Observable<CatchUpResult> {
    return this.catchUp$$.asObservable();
  }

  /** Outcome of every pushed operation */
  get operations$(): Observable<OperationEvent> {
    return this.pusher.operations$;
  }

  /** Collection lifecycle notifications from the event stream */
  get lifecycle$(): Observable<LifecycleEvent> {
    return this.processor.lifecycle$;
  }

  /** Number of queued local operations */
  get pendingCount$(): Observable<number> {
    return this.queue.size$();
  }

  get lastHeartbeatAt(): number | null {
    return this.processor.lastHeartbeatAt;
  }

  getCheckpoints(): Promise<SyncCheckpoint[]> {
    return this.checkpointManager.getAll(this.config.collections);
  }

  getConflicts(): Promise<ConflictRecord[]> {
    return this.conflicts.list();
  }

  /** Queued operations that ran out of attempts, oldest first */
  async getFailedOperations(): Promise<PendingOperation[]> {
    return (await this.queue.list()).filter((operation) => operation.status === 'failed');
  }

  /**
   * Run a sync cycle, or join the one already running.
   *
   * Resolves with a failure result for errors and library mismatches.
   * Rejects only when `signal` aborts; the status then returns to `idle`.
   */
  sync(options: SyncOptions = {}): Promise<SyncResult> {
    if (this.activeSync) {
      this.logger.debug('Joining running sync');
      return this.activeSync;
    }
    const cycle = this.runCycle(options.signal).finally(() => {
      this.activeSync = null;
    });
    this.activeSync = cycle;
    return cycle;
  }

  /**
   * Forget every checkpoint and pull everything again
   */
  async forceFullSync(options: SyncOptions = {}): Promise<SyncResult> {
    await this.settleRunningWork();
    this.checkpointGeneration++;
    await this.checkpointManager.clearAll();
    this.logger.info('Checkpoints cleared for full sync');
    return this.sync(options);
  }

  /**
   * Wipe local data and adopt `libraryId`, then sync from scratch.
   * Queued local changes are discarded.
   */
  async resetForNewLibrary(libraryId: string, options: SyncOptions = {}): Promise<SyncResult> {
    await this.settleRunningWork();
    this.checkpointGeneration++;
    await this.mutex.withLock(() =>
      guardStorage('Resetting local data', { libraryId }, async () => {
        for (const collection of ENTITY_COLLECTIONS) {
          await this.stores[collection].clear();
        }
        await this.queue.clear();
        await this.conflicts.clearAll();
        await this.checkpointManager.clearAll();
        await this.libraryIdentity.set(libraryId);
      })
    );
    this.logger.info('Local data reset for new library', { libraryId });
    this.status$$.next({ type: 'idle' });
    return this.sync(options);
  }

  /**
   * Apply a local edit and queue it for the server. While the event stream
   * is connected the queue is flushed in the background right after.
   */
  recordLocalChange<C extends EntityCollection>(
    collection: C,
    kind: 'create' | 'update',
    entity: EntityTypeMap[C]
  ): Promise<PendingOperation | null>;
  recordLocalChange(collection: EntityCollection, kind: 'delete', id: string): Promise<PendingOperation | null>;
  async recordLocalChange(
    collection: EntityCollection,
    kind: OperationKind,
    target: SyncableEntity | string
  ): Promise<PendingOperation | null> {
    const operation = await this.mutex.withLock(() =>
      guardStorage('Recording local change', { collection, kind }, () =>
        this.recorder.record(collection, kind, target)
      )
    );
    this.scheduleFlush();
    return operation;
  }

  /**
   * Queue a failed operation to be sent again. Returns false unless the
   * operation has failed.
   */
  async retryOperation(operationId: string): Promise<boolean> {
    const retried = await this.mutex.withLock(() => this.pusher.retry(operationId));
    if (retried) {
      this.scheduleFlush();
    }
    return retried;
  }

  /**
   * Drop a failed operation and restore the entity to its state before the
   * edit. Returns false unless the operation has failed.
   */
  dismissOperation(operationId: string): Promise<boolean> {
    return this.mutex.withLock(() =>
      guardStorage('Dismissing operation', { operationId }, () => this.pusher.dismiss(operationId))
    );
  }

  /**
   * Settle a flagged conflict.
   *
   * - `keep-local` queues the local copy again, stamped newer than the
   *   conflicting server version
   * - `keep-server` drops the queued edits and takes the server copy; when
   *   none was stored, the collection's checkpoint is cleared so the next
   *   sync pulls it again
   *
   * Returns false when the entity is not in conflict.
   */
  resolveConflict(collection: EntityCollection, entityId: string, choice: ConflictChoice): Promise<boolean> {
    return this.mutex.withLock(async () => {
      const store = this.stores[collection];
      const conflict = await this.conflicts.get(collection, entityId);
      const local = await store.get(entityId);
      if (!conflict && local?.syncState !== 'conflict') {
        return false;
      }

      await this.queue.removeForEntity(collection, entityId);
      if (choice === 'keep-local') {
        await this.keepLocal(collection, entityId, local, conflict);
      } else {
        await this.keepServer(collection, local, conflict);
      }
      await this.conflicts.clear(collection, entityId);

      this.logger.info('Conflict resolved', { collection, entityId, choice });
      return true;
    });
  }

  /**
   * Resolve once queued live events, background catch-ups and background
   * flushes are done
   */
  async whenIdle(): Promise<void> {
    await this.processor.whenIdle();
    while (this.activeCatchUp || this.activeFlush) {
      await Promise.all([this.activeCatchUp, this.activeFlush]);
      await this.processor.whenIdle();
    }
  }

  /**
   * Stop event processing, cancel background work and disconnect the
   * event stream
   */
  destroy(): void {
    this.lifetime.abort();
    this.eventSubscription?.unsubscribe();
    this.eventStream?.disconnect();
    this.processor.destroy();
    this.pusher.destroy();
    this.status$$.complete();
    this.catchUp$$.complete();
  }

  private async runCycle(signal?: AbortSignal): Promise<SyncResult> {
    this.status$$.next({ type: 'syncing' });
    this.logger.info('Sync started');
    const generation = this.checkpointGeneration;

    try {
      const verification = await this.verifier.verify(signal);
      if (verification.status === 'mismatch') {
        const { expected, actual, hasPendingChanges } = verification;
        this.status$$.next({ type: 'library-mismatch', expected, actual, hasPendingChanges });
        return { success: false, error: new LibraryMismatchError(expected, actual, hasPendingChanges) };
      }

      const retry = this.retryOptions(signal);

      const pull = await withRetry(
        () =>
          this.puller.pull(
            (progress) =>
              this.status$$.next(progressStatus(progress.phase, progress.current, progress.total, progress.message)),
            signal
          ),
        retry
      );

      await this.syncPreferences(signal);

      this.status$$.next(progressStatus('pushing', 0, await this.queue.count(), 'Pushing local changes'));
      const push = await withRetry(() => this.mutex.withLock(() => this.pusher.flush(signal), signal), retry);

      this.status$$.next(progressStatus('finalizing', 0, -1, 'Finalizing'));
      await this.advanceCheckpoints(pull, generation);
      await this.rebuildIndexes();
      this.connectEventStream();

      const timestamp = this.config.now();
      this.status$$.next({ type: 'success', timestamp });
      this.logger.info('Sync completed', { cursor: pull.cursor, ...push });
      return { success: true, timestamp, pull, push };
    } catch (error) {
      if (isCancellation(error) || signal?.aborted) {
        this.logger.info('Sync cancelled');
        this.status$$.next({ type: 'idle' });
        throw error;
      }
      const cause = toError(error);
      this.logger.error('Sync failed', cause);
      this.status$$.next({ type: 'error', cause });
      return { success: false, error: cause };
    }
  }

  private retryOptions(signal?: AbortSignal): RetryOptions {
    return {
      ...this.config.retry,
      signal,
      onRetry: (attempt, maxAttempts, delayMs, error) => {
        this.logger.warn('Retrying sync step', { attempt, maxAttempts, delayMs, message: toError(error).message });
        this.status$$.next({ type: 'retrying', attempt, maxAttempts });
      },
    };
  }

  private async syncPreferences(signal?: AbortSignal): Promise<void> {
    if (!this.preferences) return;
    try {
      await this.preferences.save(await this.api.getPreferences(signal));
    } catch (error) {
      if (isCancellation(error) || signal?.aborted) throw error;
      this.logger.warn('Preferences not synced', { message: toError(error).message });
    }
  }

  private async rebuildIndexes(): Promise<void> {
    for (const index of this.derivedIndexes) {
      try {
        await index.rebuild();
      } catch (error) {
        this.logger.warn('Derived index rebuild failed', { index: index.name, message: toError(error).message });
      }
    }
  }

  private connectEventStream(): void {
    if (this.eventStream && !this.eventStream.isConnected()) {
      this.eventStream.connect();
    }
  }

  /**
   * Wait for the running cycle and any background catch-up or flush
   */
  private async settleRunningWork(): Promise<void> {
    while (this.activeSync || this.activeCatchUp || this.activeFlush) {
      await Promise.allSettled([this.activeSync, this.activeCatchUp, this.activeFlush]);
    }
  }

  private async advanceCheckpoints(pull: PullSummary, generation: number): Promise<void> {
    if (generation !== this.checkpointGeneration) {
      this.logger.info('Checkpoints were cleared during the pull, not advancing them', { cursor: pull.cursor });
      return;
    }
    await this.checkpointManager.advance(pull.collections, pull.cursor);
  }

  private scheduleCatchUp(): void {
    if (this.lifetime.signal.aborted) return;
    if (this.activeSync) {
      this.logger.debug('Catch-up skipped, sync running');
      this.catchUp$$.next({ status: 'skipped' });
      return;
    }
    if (this.activeCatchUp) {
      this.logger.debug('Catch-up running, another queued');
      this.catchUpRequested = true;
      return;
    }
    this.catchUpRequested = false;
    this.activeCatchUp = this.runCatchUp().finally(() => {
      this.activeCatchUp = null;
      if (this.catchUpRequested) {
        this.scheduleCatchUp();
      }
    });
  }

  private async runCatchUp(): Promise<void> {
    const signal = this.lifetime.signal;
    const generation = this.checkpointGeneration;
    this.logger.info('Catching up after reconnect');
    try {
      const push = await this.mutex.withLock(() => this.pusher.flush(signal), signal);
      const pull = await this.puller.pull(undefined, signal);
      await this.advanceCheckpoints(pull, generation);
      this.catchUp$$.next({ status: 'completed', push, pull });
    } catch (error) {
      if (isCancellation(error) || signal.aborted) {
        this.logger.debug('Catch-up cancelled');
        return;
      }
      const cause = toError(error);
      this.logger.error('Catch-up failed', cause);
      this.catchUp$$.next({ status: 'failed', error: cause });
    }
  }

  private scheduleFlush(): void {
    if (!this.config.flushOnChange || this.lifetime.signal.aborted) return;
    if (!this.eventStream?.isConnected()) {
      this.logger.debug('Offline, local change waits for the next sync');
      return;
    }
    if (this.activeFlush) {
      this.flushRequested = true;
      return;
    }
    this.flushRequested = false;
    this.activeFlush = this.runFlush().finally(() => {
      this.activeFlush = null;
      if (this.flushRequested) {
        this.scheduleFlush();
      }
    });
  }

  private async runFlush(): Promise<void> {
    const signal = this.lifetime.signal;
    try {
      const summary = await this.mutex.withLock(() => this.pusher.flush(signal), signal);
      this.logger.debug('Local changes pushed', { ...summary });
    } catch (error) {
      if (isCancellation(error) || signal.aborted) return;
      this.logger.warn('Background push failed, changes stay queued', { message: toError(error).message });
    }
  }

  private async revokeSession(reason: string): Promise<void> {
    this.eventStream?.disconnect();
    if (this.session) {
      await this.session.clearCredentials(reason);
    }
  }

  private async keepLocal(
    collection: EntityCollection,
    entityId: string,
    local: SyncableEntity | null,
    conflict: ConflictRecord | null
  ): Promise<void> {
    const now = this.config.now();
    const serverVersion = conflict?.serverVersion ?? local?.serverVersion ?? 0;
    const stamp = Math.max(now, serverVersion + 1);
    const serverState = conflict?.serverRecord ? toEntity(conflict.serverRecord) : null;

    if (!local) {
      // Deleted locally while the server moved on: send the delete again
      await this.queue.enqueue({
        id: generateOperationId(),
        collection,
        entityId,
        kind: 'delete',
        payload: null,
        previousState: serverState,
        enqueuedAt: now,
        updatedAt: stamp,
        status: 'pending',
        attemptCount: 0,
        lastError: null,
      });
      return;
    }

    const kept: SyncableEntity = { ...local, syncState: 'not-synced', lastModified: stamp };
    await this.stores[collection].upsert(kept);
    await this.queue.enqueue({
      id: generateOperationId(),
      collection,
      entityId,
      kind: 'update',
      payload: toPayload(kept),
      previousState: serverState ?? local,
      enqueuedAt: now,
      updatedAt: stamp,
      status: 'pending',
      attemptCount: 0,
      lastError: null,
    });
  }

  private async keepServer(
    collection: EntityCollection,
    local: SyncableEntity | null,
    conflict: ConflictRecord | null
  ): Promise<void> {
    const store = this.stores[collection];
    if (conflict?.serverRecord) {
      await store.upsert(toEntity(conflict.serverRecord));
      return;
    }

    if (local) {
      await store.upsert({
        ...local,
        syncState: 'synced',
        lastModified: Math.min(local.lastModified, local.serverVersion),
      });
    }
    this.checkpointGeneration++;
    await this.checkpointManager.clear(collection);
  }
}

/**
 * Create a sync coordinator
 */
export function createSyncCoordinator(options: SyncCoordinatorOptions): SyncCoordinator {
  return new SyncCoordinator(options);
}
