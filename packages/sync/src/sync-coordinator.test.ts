import { InvalidResponseError, LibraryMismatchError, StorageError, type BookEntity } from '@catalog-sync/core';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { networkError, serverError } from './__tests__/helpers/fake-catalog-api.js';
import { createHarness, type Harness } from './__tests__/helpers/harness.js';
import type { LifecycleEvent } from './event-processor.js';
import type { SyncStatus } from './sync-status.js';

function book(id: string, title: string): BookEntity {
  return {
    id,
    title,
    subtitle: null,
    description: null,
    seriesId: null,
    seriesSequence: null,
    contributorIds: [],
    durationMs: 0,
    publishedYear: null,
    coverPath: null,
    syncState: 'synced',
    lastModified: 0,
    serverVersion: 0,
  };
}

function fetchRequests(harness: Harness): string[] {
  return harness.api.requests.filter((request) => request.startsWith('fetchChanges'));
}

const FULL_PULL_REQUESTS = [
  'fetchChanges series cursor=- updatedAfter=-',
  'fetchChanges contributors cursor=- updatedAfter=-',
  'fetchChanges books cursor=- updatedAfter=-',
];

/** Sync once, then leave a catch-up waiting on its delta fetches */
async function startSlowCatchUp(harness: Harness): Promise<void> {
  harness.api.serverUpsert('books', { id: 'b1', title: 'Dune' });
  await harness.coordinator.sync();
  harness.api.latencyMs = 30;
  harness.eventStream.emit({ type: 'reconnected' });
  await vi.waitFor(
    () => {
      expect(fetchRequests(harness)).toHaveLength(6);
    },
    { interval: 5 }
  );
}

function collectStatuses(harness: Harness): SyncStatus[] {
  const statuses: SyncStatus[] = [];
  harness.coordinator.status$.subscribe((status) => statuses.push(status));
  return statuses;
}

describe('SyncCoordinator', () => {
  let harness: Harness;

  afterEach(() => {
    harness.coordinator.destroy();
  });

  describe('sync', () => {
    it('should run a full cycle and report success', async () => {
      harness = createHarness();
      harness.api.serverUpsert('series', { id: 's1', name: 'Dune Chronicles' });
      harness.api.serverUpsert('books', { id: 'b1', title: 'Dune' });
      const statuses = collectStatuses(harness);

      const result = await harness.coordinator.sync();

      expect(result).toMatchObject({ success: true, timestamp: 1_002 });
      expect(statuses.slice(0, 3)).toEqual([
        { type: 'idle' },
        { type: 'syncing' },
        { type: 'progress', phase: 'fetching-metadata', current: 0, total: -1, message: 'Fetching library metadata' },
      ]);
      expect(statuses.slice(-3)).toEqual([
        { type: 'progress', phase: 'pushing', current: 0, total: 0, message: 'Pushing local changes' },
        { type: 'progress', phase: 'finalizing', current: 0, total: -1, message: 'Finalizing' },
        { type: 'success', timestamp: 1_002 },
      ]);
      expect(await harness.storage.entities.books.count()).toBe(1);
      expect(await harness.storage.entities.series.count()).toBe(1);
      expect(await harness.storage.preferences.get()).toEqual({ playbackSpeed: 1 });
      expect(harness.eventStream.connects).toBe(1);
    });

    it('should store the cycle start as every checkpoint', async () => {
      harness = createHarness();
      harness.api.serverUpsert('books', { id: 'b1', title: 'Dune' });

      await harness.coordinator.sync();

      expect(await harness.coordinator.getCheckpoints()).toEqual([
        { collection: 'series', lastSyncTimestamp: '1970-01-01T00:00:01.001Z' },
        { collection: 'contributors', lastSyncTimestamp: '1970-01-01T00:00:01.001Z' },
        { collection: 'books', lastSyncTimestamp: '1970-01-01T00:00:01.001Z' },
      ]);
    });

    it('should join a cycle that is already running', async () => {
      harness = createHarness();
      harness.api.latencyMs = 5;

      const first = harness.coordinator.sync();
      const second = harness.coordinator.sync();

      expect(second).toBe(first);
      expect(harness.coordinator.isSyncing).toBe(true);
      await first;
      expect(harness.coordinator.isSyncing).toBe(false);
      expect(harness.api.requests.filter((request) => request === 'getLibraryId')).toHaveLength(1);
    });

    it('should resolve with the error when a step fails', async () => {
      harness = createHarness();
      const failure = new InvalidResponseError('Malformed page');
      harness.api.failNext('fetchChanges', failure);

      const result = await harness.coordinator.sync();

      expect(result).toEqual({ success: false, error: failure });
      expect(harness.coordinator.getStatus()).toEqual({ type: 'error', cause: failure });
      expect((await harness.coordinator.getCheckpoints()).map((checkpoint) => checkpoint.lastSyncTimestamp)).toEqual([
        null,
        null,
        null,
      ]);
      expect(harness.eventStream.connects).toBe(0);
    });

    it('should end in an error after the last attempt and keep the checkpoints', async () => {
      harness = createHarness();
      harness.api.serverUpsert('books', { id: 'b1', title: 'Dune' });
      await harness.coordinator.sync();
      const failure = networkError();
      vi.spyOn(harness.api, 'fetchChanges').mockRejectedValue(failure);
      const statuses = collectStatuses(harness);

      const result = await harness.coordinator.sync();

      expect(result).toEqual({ success: false, error: failure });
      expect(statuses.filter((status) => status.type === 'retrying')).toEqual([
        { type: 'retrying', attempt: 2, maxAttempts: 3 },
        { type: 'retrying', attempt: 3, maxAttempts: 3 },
      ]);
      expect(statuses.at(-1)).toEqual({ type: 'error', cause: failure });
      expect((await harness.coordinator.getCheckpoints()).map((checkpoint) => checkpoint.lastSyncTimestamp)).toEqual([
        '1970-01-01T00:00:01.001Z',
        '1970-01-01T00:00:01.001Z',
        '1970-01-01T00:00:01.001Z',
      ]);
    });

    it('should fail without retrying when a local store breaks', async () => {
      harness = createHarness();
      harness.api.serverUpsert('books', { id: 'b1', title: 'Dune' });
      vi.spyOn(harness.storage.entities.books, 'upsert').mockRejectedValue(new Error('disk full'));
      const statuses = collectStatuses(harness);

      const result = await harness.coordinator.sync();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(StorageError);
        expect(result.error.message).toBe('Applying books page failed: disk full');
      }
      expect(statuses.some((status) => status.type === 'retrying')).toBe(false);
      expect(fetchRequests(harness).filter((request) => request.startsWith('fetchChanges books'))).toHaveLength(1);
    });

    it('should report retries of a transient failure', async () => {
      harness = createHarness();
      harness.api.failNext('fetchChanges', networkError());
      const statuses = collectStatuses(harness);

      const result = await harness.coordinator.sync();

      expect(result.success).toBe(true);
      expect(statuses).toContainEqual({ type: 'retrying', attempt: 2, maxAttempts: 3 });
    });

    it('should return to idle and reject when cancelled', async () => {
      harness = createHarness();
      harness.api.latencyMs = 20;
      const controller = new AbortController();

      const cycle = harness.coordinator.sync({ signal: controller.signal });
      setTimeout(() => controller.abort(), 5);

      await expect(cycle).rejects.toMatchObject({ name: 'AbortError' });
      expect(harness.coordinator.getStatus()).toEqual({ type: 'idle' });
      expect(harness.coordinator.isSyncing).toBe(false);
    });

    it('should stop on a library mismatch', async () => {
      harness = createHarness();
      await harness.coordinator.recordLocalChange('books', 'create', book('b1', 'Draft'));
      harness.api.libraryId = 'lib-2';

      const result = await harness.coordinator.sync();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(LibraryMismatchError);
      }
      expect(harness.coordinator.getStatus()).toEqual({
        type: 'library-mismatch',
        expected: 'lib-1',
        actual: 'lib-2',
        hasPendingChanges: true,
      });
      expect(harness.api.requests.some((request) => request.startsWith('fetchChanges'))).toBe(false);
      expect(harness.api.pushed).toEqual([]);
    });

    it('should rebuild derived indexes and tolerate a failing one', async () => {
      const rebuild = vi.fn<() => Promise<void>>().mockResolvedValue(undefined);
      const broken = vi.fn<() => Promise<void>>().mockRejectedValue(new Error('index corrupt'));
      harness = createHarness({
        derivedIndexes: [
          { name: 'broken', rebuild: broken },
          { name: 'search', rebuild },
        ],
      });

      const result = await harness.coordinator.sync();

      expect(result.success).toBe(true);
      expect(broken).toHaveBeenCalledTimes(1);
      expect(rebuild).toHaveBeenCalledTimes(1);
    });

    it('should keep going when preferences cannot be read', async () => {
      harness = createHarness();
      harness.api.failNext('getPreferences', new Error('preferences unavailable'));

      const result = await harness.coordinator.sync();

      expect(result.success).toBe(true);
      expect(await harness.storage.preferences.get()).toBeNull();
    });
  });

  describe('forceFullSync', () => {
    it('should pull every collection from the start', async () => {
      harness = createHarness();
      harness.api.serverUpsert('books', { id: 'b1', title: 'Dune' });
      await harness.coordinator.sync();
      const before = harness.api.requests.length;

      const result = await harness.coordinator.forceFullSync();

      expect(result.success).toBe(true);
      expect(harness.api.requests.slice(before).filter((request) => request.startsWith('fetchChanges'))).toEqual([
        'fetchChanges series cursor=- updatedAfter=-',
        'fetchChanges contributors cursor=- updatedAfter=-',
        'fetchChanges books cursor=- updatedAfter=-',
      ]);
    });

    it('should not let a catch-up that was running restore the checkpoints', async () => {
      harness = createHarness();
      await startSlowCatchUp(harness);
      const before = harness.api.requests.length;

      const result = await harness.coordinator.forceFullSync();

      expect(result.success).toBe(true);
      expect(harness.api.requests.slice(before).filter((request) => request.startsWith('fetchChanges'))).toEqual(
        FULL_PULL_REQUESTS
      );
    });
  });

  describe('resetForNewLibrary', () => {
    it('should wipe local data and sync the new library', async () => {
      harness = createHarness();
      await harness.storage.entities.books.upsert(book('old', 'From the old library'));
      await harness.coordinator.recordLocalChange('books', 'create', book('draft', 'Unsent'));
      harness.api.libraryId = 'lib-2';
      harness.api.serverUpsert('books', { id: 'b1', title: 'Dune' });
      await harness.coordinator.sync();

      const result = await harness.coordinator.resetForNewLibrary('lib-2');

      expect(result.success).toBe(true);
      expect(await harness.storage.libraryIdentity.get()).toBe('lib-2');
      expect((await harness.storage.entities.books.getAll()).map((entity) => entity.id)).toEqual(['b1']);
      expect(await harness.storage.queue.count()).toBe(0);
      expect(harness.api.pushed).toEqual([]);
    });

    it('should pull the new library in full even with a catch-up running', async () => {
      harness = createHarness();
      await startSlowCatchUp(harness);
      const before = harness.api.requests.length;

      const result = await harness.coordinator.resetForNewLibrary('lib-1');

      expect(result.success).toBe(true);
      expect(harness.api.requests.slice(before).filter((request) => request.startsWith('fetchChanges'))).toEqual(
        FULL_PULL_REQUESTS
      );
      expect((await harness.storage.entities.books.getAll()).map((entity) => entity.id)).toEqual(['b1']);
    });
  });

  describe('recordLocalChange', () => {
    it('should queue the change and push it on the next sync', async () => {
      harness = createHarness();
      const counts: number[] = [];
      harness.coordinator.pendingCount$.subscribe((count) => counts.push(count));

      const operation = await harness.coordinator.recordLocalChange('books', 'create', book('b1', 'Dune'));
      await harness.coordinator.sync();

      expect(operation).toMatchObject({ collection: 'books', entityId: 'b1', kind: 'create' });
      expect(counts).toEqual([0, 1, 0]);
      expect(harness.api.record('books', 'b1')).toMatchObject({ id: 'b1', title: 'Dune', updatedAt: 1_001 });
      expect((await harness.storage.entities.books.get('b1'))?.syncState).toBe('synced');
    });

    it('should queue a delete by id', async () => {
      harness = createHarness();
      harness.api.serverUpsert('books', { id: 'b1', title: 'Dune' });
      await harness.coordinator.sync();

      await harness.coordinator.recordLocalChange('books', 'delete', 'b1');
      await harness.coordinator.sync();

      expect(harness.api.record('books', 'b1')).toBeNull();
      expect(await harness.storage.entities.books.get('b1')).toBeNull();
    });

    it('should push right away while the event stream is connected', async () => {
      harness = createHarness({ flushOnChange: true });
      await harness.coordinator.sync();

      await harness.coordinator.recordLocalChange('books', 'create', book('b1', 'Dune'));
      await harness.coordinator.whenIdle();

      expect(harness.api.record('books', 'b1')).toMatchObject({ title: 'Dune', updatedAt: 1_001 });
      expect(await harness.storage.queue.count()).toBe(0);
      expect((await harness.storage.entities.books.get('b1'))?.syncState).toBe('synced');
    });

    it('should wait for the next sync while offline', async () => {
      harness = createHarness({ flushOnChange: true });

      await harness.coordinator.recordLocalChange('books', 'create', book('b1', 'Dune'));
      await harness.coordinator.whenIdle();

      expect(harness.api.pushed).toEqual([]);
      expect(await harness.storage.queue.count()).toBe(1);
    });
  });

  describe('failed operations', () => {
    async function failedOperationId(): Promise<string> {
      const [operation] = await harness.coordinator.getFailedOperations();
      if (!operation) {
        throw new Error('Expected a failed operation');
      }
      return operation.id;
    }

    it('should set aside an operation the server keeps failing and finish the cycle', async () => {
      harness = createHarness({ maxPushAttempts: 2 });
      await harness.coordinator.recordLocalChange('books', 'create', book('b1', 'Dune'));
      await harness.coordinator.recordLocalChange('books', 'create', book('b2', 'Dune Messiah'));
      harness.api.failNext('push', serverError(), 2);

      const result = await harness.coordinator.sync();

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.push).toEqual({ pushed: 1, conflicts: 0, rejected: 0, failed: 1, skipped: 0 });
      }
      expect(await harness.coordinator.getFailedOperations()).toMatchObject([
        { entityId: 'b1', status: 'failed', attemptCount: 2, lastError: 'HTTP error: 503' },
      ]);
      expect(harness.api.record('books', 'b2')).toMatchObject({ title: 'Dune Messiah' });
    });

    it('should send a retried operation with the next sync', async () => {
      harness = createHarness({ maxPushAttempts: 1 });
      await harness.coordinator.recordLocalChange('books', 'create', book('b1', 'Dune'));
      harness.api.failNext('push', serverError());
      await harness.coordinator.sync();

      expect(await harness.coordinator.retryOperation(await failedOperationId())).toBe(true);
      await harness.coordinator.sync();

      expect(await harness.coordinator.getFailedOperations()).toEqual([]);
      expect(harness.api.record('books', 'b1')).toMatchObject({ title: 'Dune' });
    });

    it('should roll back a dismissed operation', async () => {
      harness = createHarness({ maxPushAttempts: 1 });
      await harness.coordinator.recordLocalChange('books', 'create', book('b1', 'Dune'));
      harness.api.failNext('push', serverError());
      await harness.coordinator.sync();

      expect(await harness.coordinator.dismissOperation(await failedOperationId())).toBe(true);

      expect(await harness.storage.entities.books.get('b1')).toBeNull();
      expect(await harness.storage.queue.count()).toBe(0);
      expect(await harness.coordinator.dismissOperation('op-unknown')).toBe(false);
    });
  });

  describe('resolveConflict', () => {
    it('should report an entity without a conflict', async () => {
      harness = createHarness();

      expect(await harness.coordinator.resolveConflict('books', 'b1', 'keep-server')).toBe(false);
    });
  });

  describe('event stream', () => {
    it('should clear credentials and disconnect when access is revoked', async () => {
      harness = createHarness();
      await harness.coordinator.sync();

      harness.eventStream.emit({ type: 'user-revoked', reason: 'Account disabled' });
      await harness.coordinator.whenIdle();

      expect(harness.clearCredentials).toHaveBeenCalledWith('Account disabled');
      expect(harness.eventStream.disconnects).toBe(1);
    });

    it('should forward lifecycle events', async () => {
      harness = createHarness();
      const lifecycle: LifecycleEvent[] = [];
      harness.coordinator.lifecycle$.subscribe((event) => lifecycle.push(event));

      harness.eventStream.emit({ type: 'collection-lifecycle-started', stats: { libraryId: 'lib-1' } });
      await harness.coordinator.whenIdle();

      expect(lifecycle).toEqual([{ type: 'collection-lifecycle-started', stats: { libraryId: 'lib-1' } }]);
    });

    it('should track heartbeats', async () => {
      harness = createHarness();

      harness.eventStream.emit({ type: 'heartbeat', timestamp: 4_200 });
      await harness.coordinator.whenIdle();

      expect(harness.coordinator.lastHeartbeatAt).toBe(4_200);
    });
  });

  describe('destroy', () => {
    it('should disconnect the stream and complete the status', async () => {
      harness = createHarness();
      await harness.coordinator.sync();
      let completed = false;
      harness.coordinator.status$.subscribe({ complete: () => (completed = true) });

      harness.coordinator.destroy();

      expect(harness.eventStream.disconnects).toBe(1);
      expect(completed).toBe(true);
    });
  });
});
