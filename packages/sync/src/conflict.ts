import {
  toEntity,
  type ConflictRecord,
  type ConflictSource,
  type ConflictStore,
  type EntityCollection,
  type EntityStore,
  type PendingOperationQueue,
  type ServerRecord,
  type SyncableEntity,
} from '@catalog-sync/core';

/**
 * Outcome of comparing a local entity with an incoming server record
 */
export type ConflictResolution =
  | { action: 'upsert' }
  | { action: 'preserve-local' }
  | { action: 'conflict'; local: SyncableEntity; record: ConflictRecord };

export type ConflictAction = ConflictResolution['action'];

/**
 * Where the server record came from, and when it was seen
 */
export interface ConflictContext {
  collection: EntityCollection;
  source: ConflictSource;
  detectedAt: number;
}

/**
 * Decide what an incoming server record does to the local copy.
 *
 * - no local copy, or a local copy without unsent edits: take the server record
 * - unsent local edit older than the server record: conflict
 * - unsent local edit at least as new as the server record: keep local
 *
 * A local copy already flagged `conflict` still holds an unsent edit and is
 * judged like `not-synced`.
 */
export function resolveConflict(
  local: SyncableEntity | null,
  record: ServerRecord,
  context: ConflictContext
): ConflictResolution {
  if (!local || !hasUnsentEdit(local)) {
    return { action: 'upsert' };
  }

  if (record.updatedAt > local.lastModified) {
    return {
      action: 'conflict',
      local,
      record: {
        collection: context.collection,
        entityId: local.id,
        serverVersion: record.updatedAt,
        detectedAt: context.detectedAt,
        source: context.source,
        serverRecord: record,
      },
    };
  }

  return { action: 'preserve-local' };
}

function hasUnsentEdit(entity: SyncableEntity): boolean {
  return entity.syncState === 'not-synced' || entity.syncState === 'conflict';
}

/**
 * Stores an entity collection writes to, together with the conflict store
 */
export interface ConflictTarget {
  store: EntityStore;
  conflicts: ConflictStore;
}

/**
 * Apply a server record through {@link resolveConflict}.
 *
 * Callers hold the sync mutex; this performs the store writes for the
 * chosen action and returns it.
 */
export async function applyServerRecord(
  target: ConflictTarget,
  record: ServerRecord,
  context: ConflictContext
): Promise<ConflictAction> {
  const local = await target.store.get(record.id);
  const resolution = resolveConflict(local, record, context);

  switch (resolution.action) {
    case 'upsert':
      await target.store.upsert(toEntity(record));
      if (local?.syncState !== 'synced') {
        await target.conflicts.clear(context.collection, record.id);
      }
      break;
    case 'preserve-local':
      break;
    case 'conflict':
      if (resolution.local.syncState !== 'conflict') {
        await target.store.upsert({ ...resolution.local, syncState: 'conflict' });
      }
      await target.conflicts.set(resolution.record);
      break;
  }

  return resolution.action;
}

export interface DeletionTarget extends ConflictTarget {
  queue: PendingOperationQueue;
}

/**
 * Delete entities the server removed.
 *
 * Deletion wins over local edits: queued operations and conflict records
 * for the ids are dropped with them. Returns the number of dropped
 * operations. Callers hold the sync mutex.
 */
export async function applyServerDeletions(
  target: DeletionTarget,
  collection: EntityCollection,
  ids: readonly string[]
): Promise<number> {
  if (ids.length === 0) return 0;

  await target.store.deleteAll([...ids]);
  let dropped = 0;
  for (const id of ids) {
    await target.conflicts.clear(collection, id);
    dropped += await target.queue.removeForEntity(collection, id);
  }
  return dropped;
}
