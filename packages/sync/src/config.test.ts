import { ConfigurationError, ENTITY_COLLECTIONS } from '@catalog-sync/core';
import { describe, expect, it } from 'vitest';
import { eventStreamConfigSchema, resolveSyncEngineConfig, validateConfig } from './config.js';

describe('resolveSyncEngineConfig', () => {
  it('should fill in defaults', () => {
    const config = resolveSyncEngineConfig();

    expect(config.collections).toEqual(ENTITY_COLLECTIONS);
    expect(config.pageSize).toBe(100);
    expect(config.retry).toEqual({ maxAttempts: 3, initialDelayMs: 1000, maxDelayMs: 30000 });
    expect(config.selfHeal).toBe(true);
    expect(config.maxPushAttempts).toBe(3);
    expect(config.flushOnChange).toBe(true);
    expect(config.now).toBe(Date.now);
  });

  it('should keep explicit values', () => {
    const now = (): number => 42;
    const config = resolveSyncEngineConfig({
      collections: ['books'],
      pageSize: 25,
      retry: { maxAttempts: 5 },
      selfHeal: false,
      maxPushAttempts: 5,
      flushOnChange: false,
      now,
    });

    expect(config.collections).toEqual(['books']);
    expect(config.pageSize).toBe(25);
    expect(config.retry).toEqual({ maxAttempts: 5, initialDelayMs: 1000, maxDelayMs: 30000 });
    expect(config.selfHeal).toBe(false);
    expect(config.maxPushAttempts).toBe(5);
    expect(config.flushOnChange).toBe(false);
    expect(config.now()).toBe(42);
  });

  it('should reject invalid numeric options', () => {
    expect(() => resolveSyncEngineConfig({ pageSize: 0 })).toThrow(ConfigurationError);
    expect(() => resolveSyncEngineConfig({ retry: { maxAttempts: 0 } })).toThrow(ConfigurationError);
    expect(() => resolveSyncEngineConfig({ maxPushAttempts: 0 })).toThrow(ConfigurationError);
  });

  it('should reject a max delay below the initial delay', () => {
    try {
      resolveSyncEngineConfig({ retry: { initialDelayMs: 5000, maxDelayMs: 1000 } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        code: 'CATALOG_V101',
        issues: ['retry.maxDelayMs: maxDelayMs must not be lower than initialDelayMs'],
      });
    }
  });

  it('should reject an empty collection list', () => {
    expect(() => resolveSyncEngineConfig({ collections: [] })).toThrow(ConfigurationError);
  });
});

describe('validateConfig', () => {
  it('should accept an infinite reconnect limit', () => {
    expect(() =>
      validateConfig(
        eventStreamConfigSchema,
        { serverUrl: 'https://catalog.test', maxReconnectAttempts: Infinity },
        'event stream'
      )
    ).not.toThrow();
  });

  it('should name the component in the message', () => {
    expect(() => validateConfig(eventStreamConfigSchema, { serverUrl: 'not a url' }, 'event stream')).toThrow(
      /^Invalid event stream configuration: serverUrl: /
    );
  });
});
