/**
 * Zod schemas for everything the catalog server sends.
 *
 * Timestamps arrive as ISO-8601 strings or epoch milliseconds and leave as
 * epoch milliseconds.
 */

import {
  ENTITY_COLLECTIONS,
  InvalidResponseError,
  type ChangesPage,
  type EntityCollection,
  type PushResult,
  type ServerRecord,
  type SyncEvent,
  type SyncManifest,
} from '@catalog-sync/core';
import { z } from 'zod';

export const timestampSchema = z.union([z.number().finite(), z.string()]).transform((value, ctx) => {
  if (typeof value === 'number') return value;
  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp "${value}"` });
    return z.NEVER;
  }
  return parsed;
});

const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

const optionalNumber = z
  .number()
  .nullish()
  .transform((value) => value ?? null);

const collectionSchema = z.enum(ENTITY_COLLECTIONS);

export const bookRecordSchema = z.object({
  id: z.string().min(1),
  updatedAt: timestampSchema,
  title: z.string(),
  subtitle: optionalString,
  description: optionalString,
  seriesId: optionalString,
  seriesSequence: optionalString,
  contributorIds: z.array(z.string()).default([]),
  durationMs: z.number().nonnegative().default(0),
  publishedYear: optionalNumber,
  coverPath: optionalString,
});

export const seriesRecordSchema = z.object({
  id: z.string().min(1),
  updatedAt: timestampSchema,
  name: z.string(),
  description: optionalString,
});

export const contributorRecordSchema = z.object({
  id: z.string().min(1),
  updatedAt: timestampSchema,
  name: z.string(),
  biography: optionalString,
  imagePath: optionalString,
});

type WireSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export const recordSchemas: Record<EntityCollection, WireSchema<ServerRecord>> = {
  books: bookRecordSchema,
  series: seriesRecordSchema,
  contributors: contributorRecordSchema,
};

/**
 * Render zod issues as `path: message` strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

/**
 * Parse wire data or throw {@link InvalidResponseError}
 */
export function parseWire<T>(schema: WireSchema<T>, value: unknown, description: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidResponseError(`Malformed ${description}`, formatIssues(result.error));
  }
  return result.data;
}

export function parseServerRecord(collection: EntityCollection, value: unknown): ServerRecord {
  return parseWire(recordSchemas[collection], value, `${collection} record`);
}

const changesPageSchema = z.object({
  records: z.array(z.unknown()),
  deletedIds: z.array(z.string()).default([]),
  nextCursor: optionalString,
  hasMore: z.boolean(),
});

export function parseChangesPage(collection: EntityCollection, body: unknown): ChangesPage {
  const page = parseWire(changesPageSchema, body, `${collection} changes page`);
  return {
    records: page.records.map((record) => parseServerRecord(collection, record)),
    deletedIds: page.deletedIds,
    nextCursor: page.nextCursor,
    hasMore: page.hasMore,
  };
}

const pushOkSchema = z.object({
  status: z.literal('ok'),
  serverVersion: timestampSchema.nullish().transform((value) => value ?? null),
});

const pushConflictSchema = z.object({
  status: z.literal('conflict'),
  serverVersion: timestampSchema,
  record: z.unknown().optional(),
});

export const errorEnvelopeSchema = z.object({
  status: z.literal('error'),
  code: z.string(),
  message: z.string(),
});

export function parsePushOk(body: unknown): PushResult {
  const parsed = parseWire(pushOkSchema, body, 'push response');
  return { status: 'ok', serverVersion: parsed.serverVersion };
}

export function parsePushConflict(collection: EntityCollection, body: unknown): PushResult {
  const parsed = parseWire(pushConflictSchema, body, 'push conflict response');
  return {
    status: 'conflict',
    serverVersion: parsed.serverVersion,
    record:
      parsed.record === undefined || parsed.record === null
        ? null
        : parseServerRecord(collection, parsed.record),
  };
}

const manifestSchema = z.object({
  libraryId: optionalString,
  counts: z
    .object({
      books: z.number().int().nonnegative().optional(),
      series: z.number().int().nonnegative().optional(),
      contributors: z.number().int().nonnegative().optional(),
    })
    .default({}),
});

export function parseManifest(body: unknown): SyncManifest {
  return parseWire(manifestSchema, body, 'sync manifest');
}

const librarySchema = z.object({ id: z.string().min(1) });

export function parseLibraryId(body: unknown): string {
  return parseWire(librarySchema, body, 'library response').id;
}

const preferencesSchema = z.record(z.unknown());

export function parsePreferences(body: unknown): Record<string, unknown> {
  return parseWire(preferencesSchema, body, 'preferences');
}

const entityChangeData = z.object({
  collection: collectionSchema,
  record: z.unknown(),
});

const lifecycleData = z
  .object({
    libraryId: z.string().optional(),
    added: z.number().int().optional(),
    updated: z.number().int().optional(),
    removed: z.number().int().optional(),
  })
  .default({});

const eventFrameSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('entity-created'), data: entityChangeData }),
  z.object({ type: z.literal('entity-updated'), data: entityChangeData }),
  z.object({
    type: z.literal('entity-deleted'),
    data: z.object({ collection: collectionSchema, id: z.string().min(1) }),
  }),
  z.object({ type: z.literal('collection-lifecycle-started'), data: lifecycleData }),
  z.object({ type: z.literal('collection-lifecycle-completed'), data: lifecycleData }),
  z.object({
    type: z.literal('user-revoked'),
    data: z.object({ reason: z.string().default('Access revoked') }).default({}),
  }),
  z.object({
    type: z.literal('heartbeat'),
    data: z.object({ timestamp: timestampSchema.optional() }).optional(),
  }),
]);

/**
 * Parse one event stream frame (`{ type, data }`) into a {@link SyncEvent}
 */
export function parseSyncEvent(frame: unknown): SyncEvent {
  const parsed = parseWire(eventFrameSchema, frame, 'event frame');
  switch (parsed.type) {
    case 'entity-created':
    case 'entity-updated':
      return {
        type: parsed.type,
        collection: parsed.data.collection,
        record: parseServerRecord(parsed.data.collection, parsed.data.record),
      };
    case 'entity-deleted':
      return { type: 'entity-deleted', collection: parsed.data.collection, id: parsed.data.id };
    case 'collection-lifecycle-started':
    case 'collection-lifecycle-completed':
      return { type: parsed.type, stats: parsed.data };
    case 'user-revoked':
      return { type: 'user-revoked', reason: parsed.data.reason };
    case 'heartbeat':
      return { type: 'heartbeat', timestamp: parsed.data?.timestamp ?? null };
  }
}
