import type { CheckpointStore, EntityCollection } from '@catalog-sync/core';

/**
 * Per-collection pull progress
 */
export interface SyncCheckpoint {
  collection: EntityCollection;
  /** ISO-8601 cursor; null when the collection has never been pulled */
  lastSyncTimestamp: string | null;
}

/**
 * Manages sync checkpoints for resuming delta pulls.
 *
 * A checkpoint is the start time of the last cycle that pulled the
 * collection successfully. The next pull asks the server for everything
 * updated after it; clearing it forces a full pull.
 *
 * ```
 * Client                                   Server
 *   │ ── fetchChanges(updatedAfter = T0) ──► │
 *   │ ◄──────── records since T0 ─────────── │
 *   │ advance(collection, T1)                │
 * ```
 *
 * Checkpoints only move forward: advancing to an older cursor than the
 * stored one is ignored.
 */
export class CheckpointManager {
  private readonly store: CheckpointStore;

  constructor(store: CheckpointStore) {
    this.store = store;
  }

  get(collection: EntityCollection): Promise<string | null> {
    return this.store.get(collection);
  }

  async getAll(collections: readonly EntityCollection[]): Promise<SyncCheckpoint[]> {
    return Promise.all(
      collections.map(async (collection) => ({
        collection,
        lastSyncTimestamp: await this.store.get(collection),
      }))
    );
  }

  /**
   * Record `cursor` as the checkpoint of each collection
   */
  async advance(collections: readonly EntityCollection[], cursor: string): Promise<void> {
    const next = Date.parse(cursor);
    for (const collection of collections) {
      const current = await this.store.get(collection);
      if (current !== null && Date.parse(current) > next) {
        continue;
      }
      await this.store.set(collection, cursor);
    }
  }

  clear(collection: EntityCollection): Promise<void> {
    return this.store.clear(collection);
  }

  /**
   * Forget every checkpoint so the next pull is a full one
   */
  clearAll(): Promise<void> {
    return this.store.clearAll();
  }
}

/**
 * Serialize a cycle start time as a checkpoint cursor
 */
export function toCheckpointCursor(timestamp: number): string {
  return new Date(timestamp).toISOString();
}
