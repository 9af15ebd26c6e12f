import type { BookEntity, ContributorEntity, SeriesEntity } from '@catalog-sync/core';
import { MemoryEntityStore } from './entity-store.js';
import {
  MemoryCheckpointStore,
  MemoryConflictStore,
  MemoryLibraryIdentityStore,
  MemoryPreferencesStore,
} from './metadata-stores.js';
import { MemoryPendingOperationQueue } from './operation-queue.js';

export interface MemoryEntityStores {
  books: MemoryEntityStore<BookEntity>;
  series: MemoryEntityStore<SeriesEntity>;
  contributors: MemoryEntityStore<ContributorEntity>;
}

export interface MemoryStorageOptions {
  /** Library id to seed the identity store with */
  libraryId?: string;
}

/**
 * Memory storage adapter
 *
 * Bundles one in-memory implementation of every persistence collaborator
 * the sync engine needs.
 */
export class MemoryStorageAdapter {
  readonly entities: MemoryEntityStores = {
    books: new MemoryEntityStore<BookEntity>('books'),
    series: new MemoryEntityStore<SeriesEntity>('series'),
    contributors: new MemoryEntityStore<ContributorEntity>('contributors'),
  };
  readonly queue = new MemoryPendingOperationQueue();
  readonly checkpoints = new MemoryCheckpointStore();
  readonly conflicts = new MemoryConflictStore();
  readonly libraryIdentity: MemoryLibraryIdentityStore;
  readonly preferences = new MemoryPreferencesStore();

  constructor(options: MemoryStorageOptions = {}) {
    this.libraryIdentity = new MemoryLibraryIdentityStore(options.libraryId ?? null);
  }

  /**
   * Wipe every store. The library identity is cleared too.
   */
  async clear(): Promise<void> {
    await Promise.all([
      this.entities.books.clear(),
      this.entities.series.clear(),
      this.entities.contributors.clear(),
      this.queue.clear(),
      this.checkpoints.clearAll(),
      this.conflicts.clearAll(),
      this.libraryIdentity.clear(),
    ]);
  }

  async close(): Promise<void> {
    this.entities.books.destroy();
    this.entities.series.destroy();
    this.entities.contributors.destroy();
    this.queue.destroy();
  }
}

/**
 * Create a memory storage adapter
 */
export function createMemoryStorage(options?: MemoryStorageOptions): MemoryStorageAdapter {
  return new MemoryStorageAdapter(options);
}
