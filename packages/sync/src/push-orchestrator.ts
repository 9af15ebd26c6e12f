import {
  ConnectionError,
  RequestRejectedError,
  isCancellation,
  isTransientError,
  type CatalogApi,
  type ConflictRecord,
  type ConflictStore,
  type EntityCollection,
  type EntityStore,
  type PendingOperation,
  type PendingOperationQueue,
  type PushResult,
} from '@catalog-sync/core';
import { Subject, type Observable } from 'rxjs';
import { resolveLogger, toError, type Logger, type LoggerSetting } from './logger.js';
import { guardStorage } from './storage-guard.js';

/**
 * What happened to a single pushed operation
 */
export type OperationEvent =
  | { type: 'pushed'; operation: PendingOperation; serverVersion: number | null }
  | { type: 'conflict'; operation: PendingOperation; conflict: ConflictRecord }
  | { type: 'rejected'; operation: PendingOperation; error: RequestRejectedError }
  | { type: 'deferred'; operation: PendingOperation; error: Error }
  | { type: 'failed'; operation: PendingOperation; error: Error };

export interface FlushSummary {
  pushed: number;
  conflicts: number;
  rejected: number;
  /** Operations that ran out of attempts during this flush */
  failed: number;
  /** Operations left queued behind a conflict or a failed operation of their entity */
  skipped: number;
}

/** Server errors an operation may receive before it is marked failed */
export const DEFAULT_MAX_PUSH_ATTEMPTS = 3;

export interface PushOrchestratorOptions {
  api: CatalogApi;
  stores: Record<EntityCollection, EntityStore>;
  queue: PendingOperationQueue;
  conflicts: ConflictStore;
  /** Default: {@link DEFAULT_MAX_PUSH_ATTEMPTS} */
  maxAttempts?: number;
  now?: () => number;
  logger?: LoggerSetting;
}

function entityKey(collection: EntityCollection, entityId: string): string {
  return `${collection}/${entityId}`;
}

/** True when a response arrived, as opposed to the server never being reached */
function answeredByServer(error: unknown): boolean {
  return error instanceof ConnectionError && error.statusCode !== undefined;
}

/**
 * Sends queued local operations to the server one at a time, oldest first.
 *
 * The caller holds the sync mutex for the whole flush. A transient failure
 * stops the flush and is rethrown with the operation still queued; the
 * caller's retry policy decides when to try again. Once the server has
 * answered an operation with `maxAttempts` transient errors, the operation
 * is marked `failed` and the flush moves on. Failed operations stay queued,
 * holding back later edits of the same entity, until {@link PushOrchestrator.retry} or
 * {@link PushOrchestrator.dismiss} settles them.
 *
 * @example
 * ```typescript
 * pusher.operations$.subscribe((event) => {
 *   if (event.type === 'rejected') {
 *     notify(`Change reverted: ${event.error.message}`);
 *   }
 * });
 *
 * await mutex.withLock(() => pusher.flush(signal));
 * ```
 */
export class PushOrchestrator {
  private readonly api: CatalogApi;
  private readonly stores: Record<EntityCollection, EntityStore>;
  private readonly queue: PendingOperationQueue;
  private readonly conflicts: ConflictStore;
  private readonly maxAttempts: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly operations$$ = new Subject<OperationEvent>();

  private activeFlush: Promise<FlushSummary> | null = null;

  constructor(options: PushOrchestratorOptions) {
    this.api = options.api;
    this.stores = options.stores;
    this.queue = options.queue;
    this.conflicts = options.conflicts;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_PUSH_ATTEMPTS;
    this.now = options.now ?? Date.now;
    this.logger = resolveLogger(options.logger, 'PushOrchestrator');
  }

  /** Outcome of every operation sent */
  get operations$(): Observable<OperationEvent> {
    return this.operations$$.asObservable();
  }

  get isFlushing(): boolean {
    return this.activeFlush !== null;
  }

  /**
   * Push every queued operation. Joins the running flush if there is one.
   */
  flush(signal?: AbortSignal): Promise<FlushSummary> {
    if (this.activeFlush) {
      return this.activeFlush;
    }
    const flush = this.drain(signal).finally(() => {
      this.activeFlush = null;
    });
    this.activeFlush = flush;
    return flush;
  }

  /**
   * Send a failed operation again on the next flush. Returns false unless
   * the operation exists and has failed. The caller holds the sync mutex.
   */
  async retry(operationId: string): Promise<boolean> {
    const operation = await this.queue.get(operationId);
    if (operation?.status !== 'failed') return false;

    await this.queue.update({ ...operation, status: 'pending', attemptCount: 0, lastError: null });
    this.logger.info('Failed operation queued again', { operationId });
    return true;
  }

  /**
   * Drop a failed operation and restore the entity it changed, as for a
   * rejection. Returns false unless the operation exists and has failed.
   * The caller holds the sync mutex.
   */
  async dismiss(operationId: string): Promise<boolean> {
    const operation = await this.queue.get(operationId);
    if (operation?.status !== 'failed') return false;

    await this.discard(operation);
    this.logger.info('Failed operation dismissed', { operationId });
    return true;
  }

  destroy(): void {
    this.operations$$.complete();
  }

  private async drain(signal?: AbortSignal): Promise<FlushSummary> {
    const summary: FlushSummary = { pushed: 0, conflicts: 0, rejected: 0, failed: 0, skipped: 0 };
    const snapshot = await this.queue.list();
    const blocked = new Set<string>();

    for (const queued of snapshot) {
      signal?.throwIfAborted();

      // An earlier conflict may have removed it
      const operation = await this.queue.get(queued.id);
      if (!operation) continue;

      const key = entityKey(operation.collection, operation.entityId);
      if (operation.status === 'failed') {
        blocked.add(key);
        continue;
      }
      if (blocked.has(key)) {
        summary.skipped++;
        continue;
      }

      const local = await this.stores[operation.collection].get(operation.entityId);
      if (local?.syncState === 'conflict') {
        blocked.add(key);
        summary.skipped++;
        this.logger.debug('Skipping operation for conflicted entity', { operationId: operation.id, key });
        continue;
      }

      let result: PushResult;
      try {
        result = await this.api.push(operation, signal);
      } catch (error) {
        if (await this.recordFailure(operation, error, signal)) {
          blocked.add(key);
          summary.failed++;
          continue;
        }
        throw error;
      }

      await guardStorage('Recording push result', { operationId: operation.id, key }, () =>
        this.settle(operation, result, summary)
      );
    }

    if (snapshot.length > 0) {
      this.logger.info('Flush completed', { ...summary });
    }
    return summary;
  }

  private async settle(operation: PendingOperation, result: PushResult, summary: FlushSummary): Promise<void> {
    switch (result.status) {
      case 'ok':
        await this.acknowledge(operation, result.serverVersion);
        summary.pushed++;
        break;
      case 'conflict':
        await this.flagConflict(operation, result.serverVersion, result.record ?? undefined);
        summary.conflicts++;
        break;
      case 'rejected':
        await this.rollBack(
          operation,
          new RequestRejectedError(result.statusCode, result.code, result.message, {
            operationId: operation.id,
            collection: operation.collection,
            entityId: operation.entityId,
          })
        );
        summary.rejected++;
        break;
    }
  }

  /**
   * Count a transient failure against the operation. Returns true when the
   * operation is now `failed`; false when the error should be rethrown.
   */
  private async recordFailure(operation: PendingOperation, error: unknown, signal?: AbortSignal): Promise<boolean> {
    if (isCancellation(error) || signal?.aborted || !isTransientError(error)) {
      return false;
    }

    const attemptCount = operation.attemptCount + 1;
    const exhausted = attemptCount >= this.maxAttempts && answeredByServer(error);
    const updated: PendingOperation = {
      ...operation,
      status: exhausted ? 'failed' : operation.status,
      attemptCount,
      lastError: toError(error).message,
    };
    await this.queue.update(updated);

    if (exhausted) {
      this.logger.warn('Operation failed after repeated server errors', { operationId: operation.id, attemptCount });
      this.operations$$.next({ type: 'failed', operation: updated, error: toError(error) });
    } else {
      this.logger.warn('Push failed, operation stays queued', { operationId: operation.id, attemptCount });
      this.operations$$.next({ type: 'deferred', operation: updated, error: toError(error) });
    }
    return exhausted;
  }

  private async acknowledge(operation: PendingOperation, serverVersion: number | null): Promise<void> {
    await this.queue.remove(operation.id);

    const store = this.stores[operation.collection];
    const remaining = await this.queue.findForEntity(operation.collection, operation.entityId);
    if (operation.kind === 'delete') {
      // A pull earlier in the cycle may have written the entity back
      if (remaining.length === 0) {
        await store.delete(operation.entityId);
      }
    } else {
      const local = await store.get(operation.entityId);
      if (local) {
        const version = serverVersion ?? local.serverVersion;
        await store.upsert(
          remaining.length === 0
            ? {
                ...local,
                syncState: 'synced',
                serverVersion: version,
                lastModified: Math.min(local.lastModified, version),
              }
            : { ...local, serverVersion: version }
        );
      }
    }

    await this.conflicts.clear(operation.collection, operation.entityId);
    this.operations$$.next({ type: 'pushed', operation, serverVersion });
  }

  private async flagConflict(
    operation: PendingOperation,
    serverVersion: number,
    serverRecord: ConflictRecord['serverRecord']
  ): Promise<void> {
    const removed = await this.queue.removeForEntity(operation.collection, operation.entityId);

    const store = this.stores[operation.collection];
    const local = await store.get(operation.entityId);
    if (local && local.syncState !== 'conflict') {
      await store.upsert({ ...local, syncState: 'conflict' });
    }

    const conflict: ConflictRecord = {
      collection: operation.collection,
      entityId: operation.entityId,
      serverVersion,
      detectedAt: this.now(),
      source: 'push',
      ...(serverRecord ? { serverRecord } : {}),
    };
    await this.conflicts.set(conflict);

    this.logger.warn('Push conflict', { operationId: operation.id, serverVersion, removed });
    this.operations$$.next({ type: 'conflict', operation, conflict });
  }

  /**
   * Drop a rejected operation and restore the entity it changed. Later
   * queued edits of the same entity win over the rollback.
   */
  private async rollBack(operation: PendingOperation, error: RequestRejectedError): Promise<void> {
    await this.discard(operation);
    this.logger.warn('Operation rejected and rolled back', {
      operationId: operation.id,
      statusCode: error.statusCode,
      serverCode: error.serverCode,
    });
    this.operations$$.next({ type: 'rejected', operation, error });
  }

  private async discard(operation: PendingOperation): Promise<void> {
    await this.queue.remove(operation.id);

    const remaining = await this.queue.findForEntity(operation.collection, operation.entityId);
    if (remaining.length === 0) {
      const store = this.stores[operation.collection];
      if (operation.previousState === null) {
        await store.delete(operation.entityId);
      } else {
        await store.upsert(operation.previousState);
      }
    }
  }
}
