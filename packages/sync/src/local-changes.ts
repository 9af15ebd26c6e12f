import {
  CatalogError,
  toPayload,
  type ConflictStore,
  type EntityCollection,
  type EntityStore,
  type OperationKind,
  type PendingOperation,
  type PendingOperationQueue,
  type SyncableEntity,
} from '@catalog-sync/core';

let operationCounter = 0;

/**
 * Generate a unique pending operation id
 */
export function generateOperationId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `op_${timestamp}_${random}_${++operationCounter}`;
}

export interface LocalChangeRecorderOptions {
  stores: Record<EntityCollection, EntityStore>;
  queue: PendingOperationQueue;
  conflicts: ConflictStore;
  now?: () => number;
}

/**
 * Writes local edits to the entity stores and queues them for the server.
 *
 * Edits of an entity that already has a queued operation are folded into
 * it:
 *
 * | Queued | New | Result |
 * | --- | --- | --- |
 * | create/update | create/update | payload merged into the queued operation |
 * | delete | create/update | rejected (`CATALOG_V102`) |
 * | create | delete | everything dropped, nothing sent |
 * | update | delete | updates dropped, one delete queued |
 *
 * A merged operation keeps its kind, position and `previousState`, so a
 * rejection still rolls back to the state before the first edit. Merging
 * into a failed operation makes it pending again.
 *
 * The caller holds the sync mutex.
 */
export class LocalChangeRecorder {
  private readonly stores: Record<EntityCollection, EntityStore>;
  private readonly queue: PendingOperationQueue;
  private readonly conflicts: ConflictStore;
  private readonly now: () => number;

  constructor(options: LocalChangeRecorderOptions) {
    this.stores = options.stores;
    this.queue = options.queue;
    this.conflicts = options.conflicts;
    this.now = options.now ?? Date.now;
  }

  /**
   * Record a create, update or delete. Returns the queued operation, or
   * null when the change cancelled out a queued create.
   */
  async record(
    collection: EntityCollection,
    kind: OperationKind,
    target: SyncableEntity | string
  ): Promise<PendingOperation | null> {
    if (kind === 'delete') {
      if (typeof target !== 'string') {
        throw invalidChange(collection, target.id, 'Expected the entity id for delete');
      }
      return this.recordDelete(collection, target);
    }
    if (typeof target === 'string') {
      throw invalidChange(collection, target, `Expected the entity for ${kind}`);
    }
    return this.recordWrite(collection, kind, target);
  }

  private async recordWrite(
    collection: EntityCollection,
    kind: 'create' | 'update',
    entity: SyncableEntity
  ): Promise<PendingOperation> {
    const store = this.stores[collection];
    const now = this.now();
    const previous = await store.get(entity.id);
    const queued = await this.queue.findForEntity(collection, entity.id);
    const last = queued.length > 0 ? queued[queued.length - 1] : undefined;

    if (last?.kind === 'delete') {
      throw invalidChange(collection, entity.id, `Cannot ${kind} an entity with a queued delete`);
    }

    await store.upsert({
      ...entity,
      // An unresolved conflict stays flagged until the user picks a side
      syncState: previous?.syncState === 'conflict' ? 'conflict' : 'not-synced',
      lastModified: now,
      serverVersion: previous?.serverVersion ?? entity.serverVersion,
    });

    if (last) {
      const merged: PendingOperation = {
        ...last,
        payload: { ...(last.payload ?? {}), ...toPayload(entity) },
        updatedAt: now,
        status: 'pending',
        attemptCount: 0,
        lastError: null,
      };
      await this.queue.update(merged);
      return merged;
    }

    const operation: PendingOperation = {
      id: generateOperationId(),
      collection,
      entityId: entity.id,
      kind,
      payload: toPayload(entity),
      previousState: previous,
      enqueuedAt: now,
      updatedAt: now,
      status: 'pending',
      attemptCount: 0,
      lastError: null,
    };
    await this.queue.enqueue(operation);
    return operation;
  }

  private async recordDelete(collection: EntityCollection, entityId: string): Promise<PendingOperation | null> {
    const store = this.stores[collection];
    const now = this.now();
    const queued = await this.queue.findForEntity(collection, entityId);
    const first = queued[0];
    const last = queued[queued.length - 1];

    if (last?.kind === 'delete') {
      return last;
    }

    const previous = await store.get(entityId);
    await this.queue.removeForEntity(collection, entityId);
    await store.delete(entityId);
    await this.conflicts.clear(collection, entityId);

    if (first?.kind === 'create') {
      return null;
    }

    const operation: PendingOperation = {
      id: generateOperationId(),
      collection,
      entityId,
      kind: 'delete',
      payload: null,
      previousState: first ? first.previousState : previous,
      enqueuedAt: now,
      updatedAt: now,
      status: 'pending',
      attemptCount: 0,
      lastError: null,
    };
    await this.queue.enqueue(operation);
    return operation;
  }
}

function invalidChange(collection: EntityCollection, entityId: string, message: string): CatalogError {
  return new CatalogError('CATALOG_V102', {
    message: `${message} (${collection}/${entityId})`,
    context: { collection, entityId },
  });
}
