import type { EntityCollection } from '@catalog-sync/core';

/**
 * Step of a sync cycle reported in `progress` statuses
 */
export type SyncPhase =
  | 'fetching-metadata'
  | 'syncing-series'
  | 'syncing-contributors'
  | 'syncing-books'
  | 'pushing'
  | 'finalizing';

/**
 * Public state of the sync coordinator.
 *
 * ```
 * idle ──► syncing ──► progress/retrying ──► success | error | library-mismatch
 *   ▲                                                   │
 *   └───────────────────── next sync() ─────────────────┘
 * ```
 */
export type SyncStatus =
  | { type: 'idle' }
  | { type: 'syncing' }
  | {
      type: 'progress';
      phase: SyncPhase;
      current: number;
      /** -1 when the total is unknown */
      total: number;
      message: string;
    }
  | { type: 'retrying'; attempt: number; maxAttempts: number }
  | { type: 'success'; timestamp: number }
  | { type: 'error'; cause: Error }
  | { type: 'library-mismatch'; expected: string; actual: string; hasPendingChanges: boolean };

export type SyncStatusType = SyncStatus['type'];

const COLLECTION_PHASES: Record<EntityCollection, SyncPhase> = {
  books: 'syncing-books',
  series: 'syncing-series',
  contributors: 'syncing-contributors',
};

export function phaseForCollection(collection: EntityCollection): SyncPhase {
  return COLLECTION_PHASES[collection];
}

export function progressStatus(phase: SyncPhase, current: number, total: number, message: string): SyncStatus {
  return { type: 'progress', phase, current, total, message };
}

/**
 * Whether a cycle is running in this status
 */
export function isSyncActive(status: SyncStatus): boolean {
  return status.type === 'syncing' || status.type === 'progress' || status.type === 'retrying';
}

/**
 * One-line human readable summary of a status
 */
export function describeStatus(status: SyncStatus): string {
  switch (status.type) {
    case 'idle':
      return 'Idle';
    case 'syncing':
      return 'Syncing...';
    case 'progress':
      return status.total >= 0
        ? `${status.message} (${status.current}/${status.total})`
        : `${status.message} (${status.current})`;
    case 'retrying':
      return `Retrying (attempt ${status.attempt} of ${status.maxAttempts})`;
    case 'success':
      return `Synced at ${new Date(status.timestamp).toISOString()}`;
    case 'error':
      return `Sync failed: ${status.cause.message}`;
    case 'library-mismatch':
      return status.hasPendingChanges
        ? `Server library changed (${status.expected} → ${status.actual}); unsynced changes would be lost`
        : `Server library changed (${status.expected} → ${status.actual})`;
  }
}
