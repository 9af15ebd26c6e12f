/**
 * Entity collections replicated from the catalog server.
 *
 * Series and contributors come first so that books referencing them can be
 * shown as soon as they land.
 */
export const ENTITY_COLLECTIONS = ['series', 'contributors', 'books'] as const;

export type EntityCollection = (typeof ENTITY_COLLECTIONS)[number];

/**
 * Synchronization state of a local entity.
 *
 * - `synced`: the local copy matches the server version it was read from
 * - `not-synced`: a local edit is waiting in the pending operation queue
 * - `syncing`: a local edit is being sent
 * - `conflict`: a local edit and a newer server version diverged
 */
export type SyncState = 'synced' | 'not-synced' | 'syncing' | 'conflict';

/**
 * Sync metadata carried by every locally stored entity
 */
export interface SyncableEntity {
  /** Server-assigned identifier */
  id: string;
  syncState: SyncState;
  /** Local modification time (Unix ms) */
  lastModified: number;
  /** Server `updatedAt` of the last version read or acknowledged (Unix ms) */
  serverVersion: number;
}

export interface BookEntity extends SyncableEntity {
  title: string;
  subtitle: string | null;
  description: string | null;
  seriesId: string | null;
  /** Position in the series, e.g. "1" or "2.5" */
  seriesSequence: string | null;
  contributorIds: string[];
  durationMs: number;
  publishedYear: number | null;
  coverPath: string | null;
}

export interface SeriesEntity extends SyncableEntity {
  name: string;
  description: string | null;
}

export interface ContributorEntity extends SyncableEntity {
  name: string;
  biography: string | null;
  imagePath: string | null;
}

/**
 * Entity type stored in each collection
 */
export interface EntityTypeMap {
  books: BookEntity;
  series: SeriesEntity;
  contributors: ContributorEntity;
}

/**
 * Wire form of an entity: its domain fields plus the server's `updatedAt`
 */
export interface ServerRecord {
  id: string;
  /** Server modification time (Unix ms) */
  updatedAt: number;
  [field: string]: unknown;
}

/**
 * Fields that belong to the sync layer rather than to the domain
 */
export const SYNC_METADATA_FIELDS: ReadonlySet<string> = new Set([
  'syncState',
  'lastModified',
  'serverVersion',
  'updatedAt',
]);

/**
 * Convert a server record into a `synced` local entity.
 *
 * `lastModified` and `serverVersion` both take the server's `updatedAt`.
 */
export function toEntity(record: ServerRecord): SyncableEntity {
  const { updatedAt, ...fields } = record;
  return {
    ...fields,
    syncState: 'synced',
    lastModified: updatedAt,
    serverVersion: updatedAt,
  };
}

/**
 * Strip sync metadata from an entity, leaving the fields sent to the server
 */
export function toPayload(entity: object): Record<string, unknown> {
  const payload: Record<string, unknown> = {};
  for (const [field, value] of Object.entries(entity)) {
    if (!SYNC_METADATA_FIELDS.has(field)) {
      payload[field] = value;
    }
  }
  return payload;
}

export function isEntityCollection(value: unknown): value is EntityCollection {
  return typeof value === 'string' && ENTITY_COLLECTIONS.some((collection) => collection === value);
}
