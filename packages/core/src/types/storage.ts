import type { Observable } from 'rxjs';
import type { EntityCollection, EntityTypeMap, SyncState, SyncableEntity } from './entity.js';
import type { ConflictRecord, PendingOperation } from './operation.js';

/**
 * Change emitted by an entity store after a write
 */
export interface EntityChange<T extends SyncableEntity = SyncableEntity> {
  operation: 'upsert' | 'delete' | 'clear';
  /** Entity id; null for `clear` */
  entityId: string | null;
  /** Current entity state (null if deleted) */
  entity: T | null;
}

/**
 * Keyed store for one entity collection
 */
export interface EntityStore<T extends SyncableEntity = SyncableEntity> {
  get(id: string): Promise<T | null>;
  getAll(): Promise<T[]>;
  upsert(entity: T): Promise<void>;
  upsertAll(entities: T[]): Promise<void>;
  delete(id: string): Promise<void>;
  deleteAll(ids: string[]): Promise<void>;
  queryBySyncState(state: SyncState): Promise<T[]>;
  count(): Promise<number>;
  clear(): Promise<void>;

  /**
   * Observable stream of writes
   */
  changes(): Observable<EntityChange<T>>;
}

/**
 * One store per collection
 */
export type EntityStores = { [C in EntityCollection]: EntityStore<EntityTypeMap[C]> };

/**
 * Per-collection cursor of the last successful pull
 */
export interface CheckpointStore {
  get(collection: EntityCollection): Promise<string | null>;
  set(collection: EntityCollection, cursor: string): Promise<void>;
  clear(collection: EntityCollection): Promise<void>;
  clearAll(): Promise<void>;
}

/**
 * Durable FIFO of unacknowledged local mutations
 */
export interface PendingOperationQueue {
  enqueue(operation: PendingOperation): Promise<void>;
  /** Oldest operation without removing it */
  peekOldest(): Promise<PendingOperation | null>;
  /** Remove and return the oldest operation */
  dequeueOldest(): Promise<PendingOperation | null>;
  /** All operations in enqueue order */
  list(): Promise<PendingOperation[]>;
  /** Operations targeting one entity, in enqueue order */
  findForEntity(collection: EntityCollection, entityId: string): Promise<PendingOperation[]>;
  get(id: string): Promise<PendingOperation | null>;
  /** Replace a queued operation in place, keeping its position */
  update(operation: PendingOperation): Promise<void>;
  remove(id: string): Promise<void>;
  removeForEntity(collection: EntityCollection, entityId: string): Promise<number>;
  count(): Promise<number>;
  clear(): Promise<void>;

  /**
   * Emits the queue length after every change
   */
  size$(): Observable<number>;
}

export interface ConflictStore {
  set(record: ConflictRecord): Promise<void>;
  get(collection: EntityCollection, entityId: string): Promise<ConflictRecord | null>;
  list(): Promise<ConflictRecord[]>;
  clear(collection: EntityCollection, entityId: string): Promise<void>;
  clearAll(): Promise<void>;
}

/**
 * Identifier of the logical library the local data was pulled from
 */
export interface LibraryIdentityStore {
  get(): Promise<string | null>;
  set(libraryId: string): Promise<void>;
  clear(): Promise<void>;
}

export interface PreferencesStore {
  get(): Promise<Record<string, unknown> | null>;
  save(preferences: Record<string, unknown>): Promise<void>;
}

/**
 * Derived data (search index, aggregates) rebuilt after a sync cycle
 */
export interface DerivedIndex {
  readonly name: string;
  rebuild(): Promise<void>;
}
