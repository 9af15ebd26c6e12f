import type { EntityChange, EntityStore, SyncState, SyncableEntity } from '@catalog-sync/core';
import { Subject, type Observable } from 'rxjs';

/**
 * In-memory entity store for one collection.
 *
 * Entities are cloned on the way in and out so callers cannot mutate stored
 * state behind the store's back.
 */
export class MemoryEntityStore<T extends SyncableEntity = SyncableEntity> implements EntityStore<T> {
  readonly name: string;

  private entities = new Map<string, T>();
  private changes$ = new Subject<EntityChange<T>>();

  constructor(name: string) {
    this.name = name;
  }

  async get(id: string): Promise<T | null> {
    const entity = this.entities.get(id);
    return entity ? structuredClone(entity) : null;
  }

  async getAll(): Promise<T[]> {
    return Array.from(this.entities.values(), (entity) => structuredClone(entity));
  }

  async upsert(entity: T): Promise<void> {
    const stored = structuredClone(entity);
    this.entities.set(entity.id, stored);
    this.emitChange('upsert', entity.id, stored);
  }

  async upsertAll(entities: T[]): Promise<void> {
    for (const entity of entities) {
      await this.upsert(entity);
    }
  }

  async delete(id: string): Promise<void> {
    if (!this.entities.delete(id)) return;
    this.emitChange('delete', id, null);
  }

  async deleteAll(ids: string[]): Promise<void> {
    for (const id of ids) {
      await this.delete(id);
    }
  }

  async queryBySyncState(state: SyncState): Promise<T[]> {
    const matches: T[] = [];
    for (const entity of this.entities.values()) {
      if (entity.syncState === state) {
        matches.push(structuredClone(entity));
      }
    }
    return matches;
  }

  async count(): Promise<number> {
    return this.entities.size;
  }

  async clear(): Promise<void> {
    this.entities.clear();
    this.emitChange('clear', null, null);
  }

  changes(): Observable<EntityChange<T>> {
    return this.changes$.asObservable();
  }

  destroy(): void {
    this.changes$.complete();
    this.entities.clear();
  }

  private emitChange(operation: EntityChange<T>['operation'], entityId: string | null, entity: T | null): void {
    this.changes$.next({
      operation,
      entityId,
      entity: entity ? structuredClone(entity) : null,
    });
  }
}
