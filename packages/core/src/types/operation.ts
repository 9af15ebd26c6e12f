import type { EntityCollection, ServerRecord, SyncableEntity } from './entity.js';

export type OperationKind = 'create' | 'update' | 'delete';

/**
 * `failed` operations stopped being sent after too many server errors and
 * wait for the user to retry or dismiss them
 */
export type OperationStatus = 'pending' | 'failed';

/**
 * A local mutation that has not been acknowledged by the server yet
 */
export interface PendingOperation {
  id: string;
  collection: EntityCollection;
  entityId: string;
  kind: OperationKind;
  /** Domain fields to send; null for deletes */
  payload: Record<string, unknown> | null;
  /**
   * Entity as it was before the first queued edit, used to roll back a
   * permanently rejected operation. Null when the operation created it.
   */
  previousState: SyncableEntity | null;
  /** Time the operation was first queued (Unix ms) */
  enqueuedAt: number;
  /** Time of the latest edit merged into the operation (Unix ms) */
  updatedAt: number;
  status: OperationStatus;
  attemptCount: number;
  lastError: string | null;
}

export type ConflictSource = 'pull' | 'push' | 'event';

/**
 * A local edit that diverged from a newer server version.
 *
 * The local data is kept; the record describes the server side so the user
 * can review and pick a side.
 */
export interface ConflictRecord {
  collection: EntityCollection;
  entityId: string;
  /** Server `updatedAt` of the conflicting version */
  serverVersion: number;
  detectedAt: number;
  source: ConflictSource;
  /** Server copy of the entity, when the server sent one */
  serverRecord?: ServerRecord;
}
