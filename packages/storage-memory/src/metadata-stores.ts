import type {
  CheckpointStore,
  ConflictRecord,
  ConflictStore,
  EntityCollection,
  LibraryIdentityStore,
  PreferencesStore,
} from '@catalog-sync/core';

export class MemoryCheckpointStore implements CheckpointStore {
  private cursors = new Map<EntityCollection, string>();

  async get(collection: EntityCollection): Promise<string | null> {
    return this.cursors.get(collection) ?? null;
  }

  async set(collection: EntityCollection, cursor: string): Promise<void> {
    this.cursors.set(collection, cursor);
  }

  async clear(collection: EntityCollection): Promise<void> {
    this.cursors.delete(collection);
  }

  async clearAll(): Promise<void> {
    this.cursors.clear();
  }
}

export class MemoryConflictStore implements ConflictStore {
  private records = new Map<string, ConflictRecord>();

  async set(record: ConflictRecord): Promise<void> {
    this.records.set(conflictKey(record.collection, record.entityId), structuredClone(record));
  }

  async get(collection: EntityCollection, entityId: string): Promise<ConflictRecord | null> {
    const record = this.records.get(conflictKey(collection, entityId));
    return record ? structuredClone(record) : null;
  }

  async list(): Promise<ConflictRecord[]> {
    return Array.from(this.records.values(), (record) => structuredClone(record));
  }

  async clear(collection: EntityCollection, entityId: string): Promise<void> {
    this.records.delete(conflictKey(collection, entityId));
  }

  async clearAll(): Promise<void> {
    this.records.clear();
  }
}

function conflictKey(collection: EntityCollection, entityId: string): string {
  return `${collection}/${entityId}`;
}

export class MemoryLibraryIdentityStore implements LibraryIdentityStore {
  private libraryId: string | null;

  constructor(initialLibraryId: string | null = null) {
    this.libraryId = initialLibraryId;
  }

  async get(): Promise<string | null> {
    return this.libraryId;
  }

  async set(libraryId: string): Promise<void> {
    this.libraryId = libraryId;
  }

  async clear(): Promise<void> {
    this.libraryId = null;
  }
}

export class MemoryPreferencesStore implements PreferencesStore {
  private preferences: Record<string, unknown> | null = null;

  async get(): Promise<Record<string, unknown> | null> {
    return this.preferences ? structuredClone(this.preferences) : null;
  }

  async save(preferences: Record<string, unknown>): Promise<void> {
    this.preferences = structuredClone(preferences);
  }
}
