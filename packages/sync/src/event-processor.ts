import {
  isCancellation,
  type ConflictStore,
  type EntityCollection,
  type EntityStore,
  type PendingOperationQueue,
  type SyncEvent,
} from '@catalog-sync/core';
import {
  BehaviorSubject,
  Subject,
  concatMap,
  filter,
  finalize,
  firstValueFrom,
  from,
  map,
  tap,
  type Observable,
  type Subscription,
} from 'rxjs';
import { applyServerDeletions, applyServerRecord, type ConflictAction } from './conflict.js';
import { resolveLogger, toError, type Logger, type LoggerSetting } from './logger.js';
import { guardStorage } from './storage-guard.js';
import type { SyncMutex } from './sync-mutex.js';

export type LifecycleEvent = Extract<
  SyncEvent,
  { type: 'collection-lifecycle-started' | 'collection-lifecycle-completed' }
>;

/**
 * What processing an event did
 */
export type EventOutcome =
  | 'applied'
  | 'preserved'
  | 'conflict'
  | 'deleted'
  | 'forwarded'
  | 'ignored'
  | 'session-revoked'
  | 'catch-up-scheduled'
  | 'heartbeat'
  | 'failed';

export interface ProcessedEvent {
  event: SyncEvent;
  outcome: EventOutcome;
}

export interface EventStreamProcessorOptions {
  stores: Record<EntityCollection, EntityStore>;
  queue: PendingOperationQueue;
  conflicts: ConflictStore;
  mutex: SyncMutex;
  /** Collections events are applied to; events for others are ignored */
  collections: readonly EntityCollection[];
  /** Schedules the background catch-up after a reconnect */
  onReconnected: () => void;
  /** Tears the session down when the server revokes access */
  onUserRevoked: (reason: string) => Promise<void>;
  now?: () => number;
  logger?: LoggerSetting;
}

const RECORD_OUTCOMES: Record<ConflictAction, EventOutcome> = {
  upsert: 'applied',
  'preserve-local': 'preserved',
  conflict: 'conflict',
};

/**
 * Applies live server events to the local replica.
 *
 * Events from an attached stream are processed one at a time in arrival
 * order, and every entity write holds the sync mutex. A failing event is
 * logged and the stream keeps going.
 */
export class EventStreamProcessor {
  private readonly stores: Record<EntityCollection, EntityStore>;
  private readonly queue: PendingOperationQueue;
  private readonly conflicts: ConflictStore;
  private readonly mutex: SyncMutex;
  private readonly collections: ReadonlySet<EntityCollection>;
  private readonly onReconnected: () => void;
  private readonly onUserRevoked: (reason: string) => Promise<void>;
  private readonly now: () => number;
  private readonly logger: Logger;

  private readonly lifecycle$$ = new Subject<LifecycleEvent>();
  private readonly processed$$ = new Subject<ProcessedEvent>();
  private readonly pending$$ = new BehaviorSubject<number>(0);
  private readonly controller = new AbortController();
  private heartbeatAt: number | null = null;

  constructor(options: EventStreamProcessorOptions) {
    this.stores = options.stores;
    this.queue = options.queue;
    this.conflicts = options.conflicts;
    this.mutex = options.mutex;
    this.collections = new Set(options.collections);
    this.onReconnected = options.onReconnected;
    this.onUserRevoked = options.onUserRevoked;
    this.now = options.now ?? Date.now;
    this.logger = resolveLogger(options.logger, 'EventStreamProcessor');
  }

  /** Collection lifecycle notifications */
  get lifecycle$(): Observable<LifecycleEvent> {
    return this.lifecycle$$.asObservable();
  }

  /** Every event handled from an attached stream, with its outcome */
  get processed$(): Observable<ProcessedEvent> {
    return this.processed$$.asObservable();
  }

  /** Time of the last heartbeat, null before the first */
  get lastHeartbeatAt(): number | null {
    return this.heartbeatAt;
  }

  /**
   * Process `events$` strictly in order until the subscription is closed
   */
  attach(events$: Observable<SyncEvent>): Subscription {
    return events$
      .pipe(
        tap(() => this.pending$$.next(this.pending$$.getValue() + 1)),
        concatMap((event) =>
          from(this.process(event, this.controller.signal)).pipe(
            map((outcome) => ({ event, outcome })),
            finalize(() => this.pending$$.next(this.pending$$.getValue() - 1))
          )
        )
      )
      .subscribe({
        next: (processed) => this.processed$$.next(processed),
        error: (error: unknown) => this.logger.debug('Event processing stopped', { message: toError(error).message }),
      });
  }

  /**
   * Resolve once every event received so far has been processed
   */
  async whenIdle(): Promise<void> {
    await firstValueFrom(this.pending$$.pipe(filter((pending) => pending === 0)), { defaultValue: 0 });
  }

  /**
   * Apply one event. Only cancellation is thrown; other failures are
   * logged and reported as `failed`.
   */
  async process(event: SyncEvent, signal?: AbortSignal): Promise<EventOutcome> {
    try {
      return await this.handle(event, signal);
    } catch (error) {
      if (isCancellation(error) || signal?.aborted) throw error;
      this.logger.error('Failed to process event', toError(error), { type: event.type });
      return 'failed';
    }
  }

  destroy(): void {
    this.controller.abort();
    this.lifecycle$$.complete();
    this.processed$$.complete();
    this.pending$$.complete();
  }

  private async handle(event: SyncEvent, signal?: AbortSignal): Promise<EventOutcome> {
    switch (event.type) {
      case 'entity-created':
      case 'entity-updated': {
        if (!this.collections.has(event.collection)) return 'ignored';
        const { collection, record } = event;
        const action = await this.mutex.withLock(
          () =>
            guardStorage('Applying entity event', { collection, id: record.id }, () =>
              applyServerRecord(
                { store: this.stores[collection], conflicts: this.conflicts },
                record,
                { collection, source: 'event', detectedAt: this.now() }
              )
            ),
          signal
        );
        this.logger.debug('Applied entity event', { type: event.type, collection, id: record.id, action });
        return RECORD_OUTCOMES[action];
      }

      case 'entity-deleted': {
        if (!this.collections.has(event.collection)) return 'ignored';
        const { collection, id } = event;
        await this.mutex.withLock(
          () =>
            guardStorage('Applying deletion event', { collection, id }, () =>
              applyServerDeletions(
                { store: this.stores[collection], conflicts: this.conflicts, queue: this.queue },
                collection,
                [id]
              )
            ),
          signal
        );
        return 'deleted';
      }

      case 'collection-lifecycle-started':
      case 'collection-lifecycle-completed':
        this.logger.info('Library lifecycle event', { type: event.type, ...event.stats });
        this.lifecycle$$.next(event);
        return 'forwarded';

      case 'user-revoked':
        this.logger.warn('Access revoked by server', { reason: event.reason });
        await this.onUserRevoked(event.reason);
        return 'session-revoked';

      case 'reconnected':
        this.onReconnected();
        return 'catch-up-scheduled';

      case 'heartbeat':
        this.heartbeatAt = event.timestamp ?? this.now();
        return 'heartbeat';
    }
  }
}
