import type { SeriesEntity, ServerRecord, SyncState } from '@catalog-sync/core';
import { MemoryConflictStore, MemoryEntityStore, MemoryPendingOperationQueue } from '@catalog-sync/storage-memory';
import { beforeEach, describe, expect, it } from 'vitest';
import { applyServerDeletions, applyServerRecord, resolveConflict, type ConflictContext } from './conflict.js';

const context: ConflictContext = { collection: 'series', source: 'pull', detectedAt: 9_000 };

function localSeries(syncState: SyncState, lastModified: number): SeriesEntity {
  return {
    id: 's1',
    name: 'Local name',
    description: null,
    syncState,
    lastModified,
    serverVersion: 1_000,
  };
}

function serverSeries(updatedAt: number): ServerRecord {
  return { id: 's1', updatedAt, name: 'Server name', description: 'From server' };
}

describe('resolveConflict', () => {
  it('should upsert when there is no local copy', () => {
    expect(resolveConflict(null, serverSeries(2_000), context)).toEqual({ action: 'upsert' });
  });

  it('should upsert over a synced local copy regardless of timestamps', () => {
    expect(resolveConflict(localSeries('synced', 5_000), serverSeries(2_000), context)).toEqual({
      action: 'upsert',
    });
  });

  it('should flag a conflict when the server is newer than an unsent edit', () => {
    const local = localSeries('not-synced', 1_500);
    const record = serverSeries(2_000);

    expect(resolveConflict(local, record, context)).toEqual({
      action: 'conflict',
      local,
      record: {
        collection: 'series',
        entityId: 's1',
        serverVersion: 2_000,
        detectedAt: 9_000,
        source: 'pull',
        serverRecord: record,
      },
    });
  });

  it('should preserve an unsent edit that is newer than the server', () => {
    expect(resolveConflict(localSeries('not-synced', 3_000), serverSeries(2_000), context)).toEqual({
      action: 'preserve-local',
    });
  });

  it('should preserve an unsent edit with the same timestamp', () => {
    expect(resolveConflict(localSeries('not-synced', 2_000), serverSeries(2_000), context)).toEqual({
      action: 'preserve-local',
    });
  });

  it('should judge an already conflicted copy like an unsent edit', () => {
    expect(resolveConflict(localSeries('conflict', 1_500), serverSeries(2_000), context).action).toBe(
      'conflict'
    );
    expect(resolveConflict(localSeries('conflict', 2_500), serverSeries(2_000), context).action).toBe(
      'preserve-local'
    );
  });
});

describe('applyServerRecord', () => {
  let store: MemoryEntityStore<SeriesEntity>;
  let conflicts: MemoryConflictStore;

  beforeEach(() => {
    store = new MemoryEntityStore<SeriesEntity>('series');
    conflicts = new MemoryConflictStore();
  });

  it('should write a synced entity for a new record', async () => {
    const action = await applyServerRecord({ store, conflicts }, serverSeries(2_000), context);

    expect(action).toBe('upsert');
    expect(await store.get('s1')).toEqual({
      id: 's1',
      name: 'Server name',
      description: 'From server',
      syncState: 'synced',
      lastModified: 2_000,
      serverVersion: 2_000,
    });
  });

  it('should keep local data and record the conflict', async () => {
    await store.upsert(localSeries('not-synced', 1_500));

    const action = await applyServerRecord({ store, conflicts }, serverSeries(2_000), context);

    expect(action).toBe('conflict');
    const stored = await store.get('s1');
    expect(stored?.name).toBe('Local name');
    expect(stored?.syncState).toBe('conflict');
    expect(stored?.lastModified).toBe(1_500);
    expect(await conflicts.get('series', 's1')).toMatchObject({ serverVersion: 2_000, source: 'pull' });
  });

  it('should leave a newer local edit untouched', async () => {
    await store.upsert(localSeries('not-synced', 3_000));

    const action = await applyServerRecord({ store, conflicts }, serverSeries(2_000), context);

    expect(action).toBe('preserve-local');
    expect(await store.get('s1')).toEqual(localSeries('not-synced', 3_000));
    expect(await conflicts.list()).toEqual([]);
  });
});

describe('applyServerDeletions', () => {
  it('should delete unsent edits together with their operations and conflicts', async () => {
    const store = new MemoryEntityStore<SeriesEntity>('series');
    const conflicts = new MemoryConflictStore();
    const queue = new MemoryPendingOperationQueue();
    await store.upsert(localSeries('conflict', 1_500));
    await queue.enqueue({
      id: 'op-1',
      collection: 'series',
      entityId: 's1',
      kind: 'update',
      payload: { id: 's1', name: 'Local name' },
      previousState: null,
      enqueuedAt: 1_500,
      updatedAt: 1_500,
      status: 'pending',
      attemptCount: 0,
      lastError: null,
    });
    await conflicts.set({ collection: 'series', entityId: 's1', serverVersion: 2_000, detectedAt: 9_000, source: 'pull' });

    const dropped = await applyServerDeletions({ store, conflicts, queue }, 'series', ['s1', 'missing']);

    expect(dropped).toBe(1);
    expect(await store.get('s1')).toBeNull();
    expect(await queue.count()).toBe(0);
    expect(await conflicts.list()).toEqual([]);
  });
});
