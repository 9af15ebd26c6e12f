import {
  ConnectionError,
  isCancellation,
  type CatalogApi,
  type ChangesPage,
  type EntityCollection,
  type FetchChangesParams,
  type PendingOperation,
  type PushResult,
  type SyncManifest,
} from '@catalog-sync/core';
import { createLinkedController } from '../abort.js';
import { httpCatalogApiConfigSchema, validateConfig } from '../config.js';
import { resolveLogger, type Logger, type LoggerSetting } from '../logger.js';
import {
  errorEnvelopeSchema,
  parseChangesPage,
  parseLibraryId,
  parseManifest,
  parsePreferences,
  parsePushConflict,
  parsePushOk,
} from './wire.js';

/**
 * Configuration for {@link HttpCatalogApi}
 */
export interface HttpCatalogApiConfig {
  /** Base URL of the catalog server, e.g. `https://catalog.example.com` */
  serverUrl: string;
  /** Static bearer token */
  authToken?: string;
  /** Token provider consulted before every request; wins over `authToken` */
  getAuthToken?: () => string | null | Promise<string | null>;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  logger?: LoggerSetting;
}

type HttpMethod = 'GET' | 'POST' | 'DELETE';

/**
 * Catalog API client over HTTP.
 *
 * ## Endpoints
 *
 * - `GET /api/v1/sync/{collection}?limit&cursor&updatedAfter` - changes page
 * - `POST /api/v1/sync/{collection}/{id}` - create or update
 * - `DELETE /api/v1/sync/{collection}/{id}` - delete
 * - `GET /api/v1/sync/manifest` - per-collection counts
 * - `GET /api/v1/library` - library identity
 * - `GET /api/v1/user/preferences` - user preferences
 *
 * ## Failure mapping
 *
 * | Failure | Result |
 * | --- | --- |
 * | network error | `ConnectionError` C500, retryable |
 * | 401 / 403 | `ConnectionError` C501, not retryable |
 * | 408 / 429 / 5xx | `ConnectionError` C502, retryable |
 * | timeout | `ConnectionError` C503, retryable |
 * | 409 on push | `{ status: 'conflict' }` |
 * | other 4xx on push | `{ status: 'rejected' }` |
 * | 404 on delete | `{ status: 'ok' }` |
 * | malformed body | `InvalidResponseError` |
 *
 * Aborting the caller's signal rejects with the abort reason unchanged.
 *
 * @example
 * ```typescript
 * const api = createHttpCatalogApi({
 *   serverUrl: 'https://catalog.example.com',
 *   getAuthToken: () => session.accessToken,
 * });
 * ```
 */
export class HttpCatalogApi implements CatalogApi {
  private readonly config: Required<Omit<HttpCatalogApiConfig, 'logger' | 'authToken' | 'getAuthToken'>>;
  private readonly getAuthToken: () => string | null | Promise<string | null>;
  private readonly logger: Logger;

  constructor(config: HttpCatalogApiConfig) {
    validateConfig(httpCatalogApiConfigSchema, config, 'HTTP catalog API');
    this.config = {
      serverUrl: config.serverUrl,
      timeout: config.timeout ?? 30000,
    };
    const staticToken = config.authToken ?? null;
    this.getAuthToken = config.getAuthToken ?? (() => staticToken);
    this.logger = resolveLogger(config.logger, 'HttpCatalogApi');
  }

  async fetchChanges(
    collection: EntityCollection,
    params: FetchChangesParams,
    signal?: AbortSignal
  ): Promise<ChangesPage> {
    const query = new URLSearchParams({ limit: String(params.limit) });
    if (params.cursor !== null) {
      query.set('cursor', params.cursor);
    }
    if (params.updatedAfter !== null) {
      query.set('updatedAfter', params.updatedAfter);
    }

    const path = `/api/v1/sync/${collection}`;
    const response = await this.request('GET', `${path}?${query.toString()}`, { signal });
    await this.ensureOk(response, path);
    return parseChangesPage(collection, await this.readJson(response));
  }

  async push(operation: PendingOperation, signal?: AbortSignal): Promise<PushResult> {
    const path = `/api/v1/sync/${operation.collection}/${encodeURIComponent(operation.entityId)}`;
    const response =
      operation.kind === 'delete'
        ? await this.request('DELETE', path, { signal })
        : await this.request('POST', path, {
            signal,
            body: {
              operation: operation.kind,
              data: operation.payload,
              clientUpdatedAt: new Date(operation.updatedAt).toISOString(),
            },
          });

    if (response.status === 409) {
      return parsePushConflict(operation.collection, await this.readJson(response));
    }
    if (response.status === 404 && operation.kind === 'delete') {
      this.logger.debug('Delete target already gone', { entityId: operation.entityId });
      return { status: 'ok', serverVersion: null };
    }
    if (isRejectionStatus(response.status)) {
      return this.toRejection(response);
    }

    await this.ensureOk(response, path);
    return parsePushOk(await this.readJson(response));
  }

  async getManifest(signal?: AbortSignal): Promise<SyncManifest> {
    const path = '/api/v1/sync/manifest';
    const response = await this.request('GET', path, { signal });
    await this.ensureOk(response, path);
    return parseManifest(await this.readJson(response));
  }

  async getLibraryId(signal?: AbortSignal): Promise<string> {
    const path = '/api/v1/library';
    const response = await this.request('GET', path, { signal });
    await this.ensureOk(response, path);
    return parseLibraryId(await this.readJson(response));
  }

  async getPreferences(signal?: AbortSignal): Promise<Record<string, unknown>> {
    const path = '/api/v1/user/preferences';
    const response = await this.request('GET', path, { signal });
    await this.ensureOk(response, path);
    return parsePreferences(await this.readJson(response));
  }

  private async request(
    method: HttpMethod,
    path: string,
    options: { signal?: AbortSignal; body?: unknown }
  ): Promise<Response> {
    const url = new URL(path, this.config.serverUrl);
    const { controller, release } = createLinkedController(options.signal);
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeout);

    try {
      return await fetch(url.toString(), {
        method,
        headers: await this.getHeaders(options.body !== undefined),
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });
    } catch (error) {
      if (timedOut) {
        throw new ConnectionError('CATALOG_C503', `Request timed out after ${this.config.timeout}ms`, {
          retryable: true,
          context: { method, path },
        });
      }
      if (options.signal?.aborted || isCancellation(error)) {
        throw error;
      }
      this.logger.warn('Request failed', { method, path });
      throw new ConnectionError('CATALOG_C500', `Network request failed: ${method} ${path}`, {
        retryable: true,
        context: { method, path },
        cause: error instanceof Error ? error : undefined,
      });
    } finally {
      clearTimeout(timeoutId);
      release();
    }
  }

  private async getHeaders(hasBody: boolean): Promise<Record<string, string>> {
    const headers: Record<string, string> = { Accept: 'application/json' };

    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }

    const token = await this.getAuthToken();
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    return headers;
  }

  /**
   * Throw the ConnectionError matching a failed response
   */
  private async ensureOk(response: Response, path: string): Promise<void> {
    if (response.ok) return;

    const detail = await this.readErrorMessage(response);

    if (response.status === 401 || response.status === 403) {
      throw new ConnectionError('CATALOG_C501', detail ?? `Authentication rejected (${response.status})`, {
        retryable: false,
        statusCode: response.status,
        context: { path },
      });
    }

    throw new ConnectionError('CATALOG_C502', detail ?? `HTTP error: ${response.status}`, {
      retryable: isRetryableStatus(response.status),
      statusCode: response.status,
      context: { path },
    });
  }

  private async toRejection(response: Response): Promise<PushResult> {
    const body = await this.readJsonSafely(response);
    const envelope = errorEnvelopeSchema.safeParse(body);
    const rejection: PushResult = envelope.success
      ? { status: 'rejected', statusCode: response.status, code: envelope.data.code, message: envelope.data.message }
      : {
          status: 'rejected',
          statusCode: response.status,
          code: `HTTP_${response.status}`,
          message: `Request rejected with status ${response.status}`,
        };
    this.logger.warn('Operation rejected', { statusCode: response.status });
    return rejection;
  }

  private async readErrorMessage(response: Response): Promise<string | null> {
    const envelope = errorEnvelopeSchema.safeParse(await this.readJsonSafely(response));
    return envelope.success ? envelope.data.message : null;
  }

  private async readJson(response: Response): Promise<unknown> {
    const text = await response.text();
    if (text.length === 0) return null;
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      this.logger.warn('Response body is not JSON', {
        status: response.status,
        error: error instanceof Error ? error.message : String(error),
      });
      return text;
    }
  }

  private async readJsonSafely(response: Response): Promise<unknown> {
    try {
      return await this.readJson(response);
    } catch (error) {
      this.logger.debug('Could not read response body', {
        status: response.status,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}

/**
 * Statuses that say "try again later" rather than "never"
 */
function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * 4xx answers to a push that refuse the operation for good
 */
function isRejectionStatus(status: number): boolean {
  return status >= 400 && status < 500 && status !== 401 && status !== 403 && !isRetryableStatus(status);
}

/**
 * Create an HTTP catalog API client
 */
export function createHttpCatalogApi(config: HttpCatalogApiConfig): HttpCatalogApi {
  return new HttpCatalogApi(config);
}
