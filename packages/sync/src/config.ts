import { ConfigurationError, ENTITY_COLLECTIONS, type EntityCollection } from '@catalog-sync/core';
import { z } from 'zod';
import type { LoggerSetting } from './logger.js';
import { DEFAULT_MAX_PUSH_ATTEMPTS } from './push-orchestrator.js';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './retry.js';
import { formatIssues } from './transport/wire.js';

/**
 * Sync engine configuration
 */
export interface SyncEngineConfig {
  /** Collections to sync (default: series, contributors, books) */
  collections?: readonly EntityCollection[];
  /** Records requested per page (default: 100) */
  pageSize?: number;
  /** Retry policy for the pull and push steps */
  retry?: RetryPolicy;
  /**
   * Re-pull a collection in full when a delta pull leaves fewer local
   * entities than the server manifest reports (default: true)
   */
  selfHeal?: boolean;
  /**
   * Server errors a queued operation may receive before it is marked
   * failed and left for the user to retry or dismiss (default: 3)
   */
  maxPushAttempts?: number;
  /** Push a local change right away while the event stream is connected (default: true) */
  flushOnChange?: boolean;
  logger?: LoggerSetting;
  /** Clock used for timestamps (default: Date.now) */
  now?: () => number;
}

export type ResolvedSyncEngineConfig = Required<Omit<SyncEngineConfig, 'logger' | 'retry'>> & {
  retry: Required<RetryPolicy>;
};

const retryPolicySchema = z
  .object({
    maxAttempts: z.number().int().min(1).optional(),
    initialDelayMs: z.number().min(0).optional(),
    maxDelayMs: z.number().min(0).optional(),
  })
  .refine(
    (policy) =>
      (policy.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs) >=
      (policy.initialDelayMs ?? DEFAULT_RETRY_POLICY.initialDelayMs),
    { message: 'maxDelayMs must not be lower than initialDelayMs', path: ['maxDelayMs'] }
  );

const syncEngineConfigSchema = z.object({
  collections: z.array(z.enum(ENTITY_COLLECTIONS)).min(1).optional(),
  pageSize: z.number().int().min(1).max(10_000).optional(),
  retry: retryPolicySchema.optional(),
  selfHeal: z.boolean().optional(),
  maxPushAttempts: z.number().int().min(1).optional(),
  flushOnChange: z.boolean().optional(),
});

export const httpCatalogApiConfigSchema = z.object({
  serverUrl: z.string().url(),
  timeout: z.number().int().positive().optional(),
});

export const eventStreamConfigSchema = z.object({
  serverUrl: z.string().url(),
  reconnectDelay: z.number().min(0).optional(),
  maxReconnectDelay: z.number().min(0).optional(),
  maxReconnectAttempts: z.number().min(0).optional(),
  heartbeatTimeout: z.number().min(0).optional(),
});

/**
 * Validate options against `schema`, throwing {@link ConfigurationError}
 * with every issue found
 */
export function validateConfig(schema: z.ZodTypeAny, config: unknown, name: string): void {
  const result = schema.safeParse(config);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${name} configuration`, formatIssues(result.error));
  }
}

/**
 * Fill in defaults for the sync engine configuration
 */
export function resolveSyncEngineConfig(config: SyncEngineConfig = {}): ResolvedSyncEngineConfig {
  validateConfig(syncEngineConfigSchema, config, 'sync engine');
  return {
    collections: config.collections ?? ENTITY_COLLECTIONS,
    pageSize: config.pageSize ?? 100,
    retry: {
      maxAttempts: config.retry?.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
      initialDelayMs: config.retry?.initialDelayMs ?? DEFAULT_RETRY_POLICY.initialDelayMs,
      maxDelayMs: config.retry?.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
    },
    selfHeal: config.selfHeal ?? true,
    maxPushAttempts: config.maxPushAttempts ?? DEFAULT_MAX_PUSH_ATTEMPTS,
    flushOnChange: config.flushOnChange ?? true,
    now: config.now ?? Date.now,
  };
}
