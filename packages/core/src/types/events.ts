import type { Observable } from 'rxjs';
import type { EntityCollection, ServerRecord } from './entity.js';

/**
 * Library statistics attached to collection lifecycle events
 */
export interface LifecycleStats {
  libraryId?: string;
  added?: number;
  updated?: number;
  removed?: number;
}

/**
 * Live event pushed by the server, or synthesized by the client
 * (`reconnected`)
 */
export type SyncEvent =
  | { type: 'entity-created'; collection: EntityCollection; record: ServerRecord }
  | { type: 'entity-updated'; collection: EntityCollection; record: ServerRecord }
  | { type: 'entity-deleted'; collection: EntityCollection; id: string }
  | { type: 'collection-lifecycle-started'; stats: LifecycleStats }
  | { type: 'collection-lifecycle-completed'; stats: LifecycleStats }
  | { type: 'user-revoked'; reason: string }
  | { type: 'reconnected' }
  | { type: 'heartbeat'; timestamp: number | null };

export type SyncEventType = SyncEvent['type'];

/**
 * Source of live events
 */
export interface EventStream {
  /** Events in arrival order */
  readonly events$: Observable<SyncEvent>;
  connect(): void;
  disconnect(): void;
  isConnected(): boolean;
}
