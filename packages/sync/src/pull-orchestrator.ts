import {
  InvalidResponseError,
  isCancellation,
  type CatalogApi,
  type ChangesPage,
  type ConflictStore,
  type EntityCollection,
  type EntityStore,
  type PendingOperationQueue,
} from '@catalog-sync/core';
import { createLinkedController } from './abort.js';
import { CheckpointManager, toCheckpointCursor } from './checkpoint.js';
import type { ResolvedSyncEngineConfig } from './config.js';
import { applyServerDeletions, applyServerRecord } from './conflict.js';
import { resolveLogger, toError, type Logger, type LoggerSetting } from './logger.js';
import { guardStorage } from './storage-guard.js';
import type { SyncMutex } from './sync-mutex.js';
import { phaseForCollection, type SyncPhase } from './sync-status.js';

/**
 * Progress of a pull, reported once for the manifest and once per page
 */
export interface PullProgress {
  phase: SyncPhase;
  /** Null while fetching the manifest */
  collection: EntityCollection | null;
  /** Records received so far for the collection */
  current: number;
  /** Manifest count, or -1 when unknown */
  total: number;
  message: string;
}

export type PullProgressListener = (progress: PullProgress) => void;

export interface CollectionPullSummary {
  collection: EntityCollection;
  pages: number;
  /** Records written as synced entities */
  applied: number;
  /** Records skipped in favour of a newer local edit */
  preserved: number;
  conflicts: number;
  deleted: number;
  /** Whether the pull started without a checkpoint */
  fullPull: boolean;
  /** Whether a delta pull was followed by a full re-pull */
  selfHealed: boolean;
}

export interface PullSummary {
  /** Cycle start cursor; becomes the checkpoint once the cycle succeeds */
  cursor: string;
  collections: EntityCollection[];
  results: CollectionPullSummary[];
}

export interface PullOrchestratorOptions {
  api: CatalogApi;
  stores: Record<EntityCollection, EntityStore>;
  queue: PendingOperationQueue;
  conflicts: ConflictStore;
  checkpoints: CheckpointManager;
  mutex: SyncMutex;
  config: ResolvedSyncEngineConfig;
  logger?: LoggerSetting;
}

const COLLECTION_LABELS: Record<EntityCollection, string> = {
  series: 'Syncing series',
  contributors: 'Syncing contributors',
  books: 'Syncing books',
};

/**
 * Paginated delta pull of every configured collection.
 *
 * Collections are pulled in parallel; when one fails the others are
 * aborted and the error propagates. Each page is applied under the sync
 * mutex, so live events never interleave with a half-written page.
 *
 * The orchestrator never writes checkpoints. It reports the cursor taken
 * at the start of the pull and the caller stores it once the whole cycle
 * has succeeded.
 */
export class PullOrchestrator {
  private readonly api: CatalogApi;
  private readonly stores: Record<EntityCollection, EntityStore>;
  private readonly queue: PendingOperationQueue;
  private readonly conflicts: ConflictStore;
  private readonly checkpoints: CheckpointManager;
  private readonly mutex: SyncMutex;
  private readonly config: ResolvedSyncEngineConfig;
  private readonly logger: Logger;

  constructor(options: PullOrchestratorOptions) {
    this.api = options.api;
    this.stores = options.stores;
    this.queue = options.queue;
    this.conflicts = options.conflicts;
    this.checkpoints = options.checkpoints;
    this.mutex = options.mutex;
    this.config = options.config;
    this.logger = resolveLogger(options.logger, 'PullOrchestrator');
  }

  async pull(onProgress?: PullProgressListener, signal?: AbortSignal): Promise<PullSummary> {
    const cursor = toCheckpointCursor(this.config.now());
    const collections = [...this.config.collections];

    onProgress?.({
      phase: 'fetching-metadata',
      collection: null,
      current: 0,
      total: -1,
      message: 'Fetching library metadata',
    });
    const totals = await this.fetchTotals(signal);

    const { controller, release } = createLinkedController(signal);
    try {
      const results = await Promise.all(
        collections.map((collection) =>
          this.pullCollection(collection, totals[collection], onProgress, controller.signal).catch(
            (error: unknown) => {
              controller.abort();
              throw error;
            }
          )
        )
      );

      this.logger.info('Pull completed', {
        cursor,
        applied: results.reduce((sum, result) => sum + result.applied, 0),
        deleted: results.reduce((sum, result) => sum + result.deleted, 0),
      });
      return { cursor, collections, results };
    } finally {
      release();
    }
  }

  private async pullCollection(
    collection: EntityCollection,
    total: number,
    onProgress: PullProgressListener | undefined,
    signal: AbortSignal
  ): Promise<CollectionPullSummary> {
    const checkpoint = await this.checkpoints.get(collection);
    const summary = await this.pullPages(collection, checkpoint, total, onProgress, signal);

    if (!this.config.selfHeal || checkpoint === null || total <= 0) {
      return summary;
    }

    const localCount = await this.stores[collection].count();
    if (localCount >= total) {
      return summary;
    }

    this.logger.warn('Local count below server count, re-pulling in full', { collection, localCount, total });
    const full = await this.pullPages(collection, null, total, onProgress, signal);
    return {
      collection,
      pages: summary.pages + full.pages,
      applied: summary.applied + full.applied,
      preserved: summary.preserved + full.preserved,
      conflicts: summary.conflicts + full.conflicts,
      deleted: summary.deleted + full.deleted,
      fullPull: false,
      selfHealed: true,
    };
  }

  private async pullPages(
    collection: EntityCollection,
    updatedAfter: string | null,
    total: number,
    onProgress: PullProgressListener | undefined,
    signal: AbortSignal
  ): Promise<CollectionPullSummary> {
    const summary: CollectionPullSummary = {
      collection,
      pages: 0,
      applied: 0,
      preserved: 0,
      conflicts: 0,
      deleted: 0,
      fullPull: updatedAfter === null,
      selfHealed: false,
    };

    let cursor: string | null = null;
    let hasMore = true;
    let received = 0;

    while (hasMore) {
      const page: ChangesPage = await this.api.fetchChanges(
        collection,
        { limit: this.config.pageSize, cursor, updatedAfter },
        signal
      );
      if (page.hasMore && page.nextCursor === null) {
        throw new InvalidResponseError(`Page of ${collection} has more data but no cursor`, [], {
          collection,
          page: summary.pages + 1,
        });
      }

      const pageNumber = summary.pages + 1;
      await this.mutex.withLock(
        () =>
          guardStorage(`Applying ${collection} page`, { collection, page: pageNumber }, () =>
            this.applyPage(collection, page, summary)
          ),
        signal
      );

      summary.pages++;
      received += page.records.length;
      onProgress?.({
        phase: phaseForCollection(collection),
        collection,
        current: received,
        total,
        message: COLLECTION_LABELS[collection],
      });

      cursor = page.nextCursor;
      hasMore = page.hasMore;
    }

    this.logger.debug('Collection pulled', { ...summary });
    return summary;
  }

  private async applyPage(
    collection: EntityCollection,
    page: ChangesPage,
    summary: CollectionPullSummary
  ): Promise<void> {
    const target = {
      store: this.stores[collection],
      conflicts: this.conflicts,
      queue: this.queue,
    };

    for (const record of page.records) {
      const action = await applyServerRecord(target, record, {
        collection,
        source: 'pull',
        detectedAt: this.config.now(),
      });
      switch (action) {
        case 'upsert':
          summary.applied++;
          break;
        case 'preserve-local':
          summary.preserved++;
          break;
        case 'conflict':
          summary.conflicts++;
          break;
      }
    }

    const dropped = await applyServerDeletions(target, collection, page.deletedIds);
    if (dropped > 0) {
      this.logger.warn('Server deletion discarded queued local edits', { collection, dropped });
    }
    summary.deleted += page.deletedIds.length;
  }

  /**
   * Per-collection totals from the manifest; -1 where unknown
   */
  private async fetchTotals(signal?: AbortSignal): Promise<Record<EntityCollection, number>> {
    try {
      const manifest = await this.api.getManifest(signal);
      return {
        books: manifest.counts.books ?? -1,
        series: manifest.counts.series ?? -1,
        contributors: manifest.counts.contributors ?? -1,
      };
    } catch (error) {
      if (isCancellation(error) || signal?.aborted) throw error;
      this.logger.warn('Manifest unavailable, totals unknown', { message: toError(error).message });
      return { books: -1, series: -1, contributors: -1 };
    }
  }
}
