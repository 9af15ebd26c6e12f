import { describe, expect, it } from 'vitest';
import { describeStatus, isSyncActive, phaseForCollection, progressStatus } from './sync-status.js';

describe('sync status helpers', () => {
  it('should map collections to phases', () => {
    expect(phaseForCollection('books')).toBe('syncing-books');
    expect(phaseForCollection('series')).toBe('syncing-series');
    expect(phaseForCollection('contributors')).toBe('syncing-contributors');
  });

  it('should treat syncing, progress and retrying as active', () => {
    expect(isSyncActive({ type: 'syncing' })).toBe(true);
    expect(isSyncActive(progressStatus('pushing', 0, -1, 'Pushing'))).toBe(true);
    expect(isSyncActive({ type: 'retrying', attempt: 2, maxAttempts: 3 })).toBe(true);
    expect(isSyncActive({ type: 'idle' })).toBe(false);
    expect(isSyncActive({ type: 'success', timestamp: 0 })).toBe(false);
  });

  it('should describe statuses', () => {
    expect(describeStatus(progressStatus('syncing-books', 40, 120, 'Syncing books'))).toBe(
      'Syncing books (40/120)'
    );
    expect(describeStatus(progressStatus('syncing-books', 40, -1, 'Syncing books'))).toBe('Syncing books (40)');
    expect(describeStatus({ type: 'retrying', attempt: 2, maxAttempts: 3 })).toBe('Retrying (attempt 2 of 3)');
    expect(describeStatus({ type: 'success', timestamp: Date.UTC(2024, 0, 1) })).toBe(
      'Synced at 2024-01-01T00:00:00.000Z'
    );
    expect(describeStatus({ type: 'error', cause: new Error('offline') })).toBe('Sync failed: offline');
    expect(
      describeStatus({ type: 'library-mismatch', expected: 'lib-a', actual: 'lib-b', hasPendingChanges: false })
    ).toBe('Server library changed (lib-a → lib-b)');
  });
});
