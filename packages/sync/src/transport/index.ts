/**
 * Network layer of the sync engine.
 *
 * - {@link HttpCatalogApi}: request/response catalog API (pull, push,
 *   manifest, library identity, preferences)
 * - {@link WebSocketEventStream}: live server events
 * - wire schemas shared by both
 *
 * @module sync/transport
 *
 * @example
 * ```typescript
 * const api = createHttpCatalogApi({ serverUrl, authToken });
 * const eventStream = createWebSocketEventStream({ serverUrl, authToken });
 * ```
 */
export * from './http.js';
export * from './websocket.js';
export {
  bookRecordSchema,
  contributorRecordSchema,
  parseChangesPage,
  parseServerRecord,
  parseSyncEvent,
  seriesRecordSchema,
  timestampSchema,
} from './wire.js';
