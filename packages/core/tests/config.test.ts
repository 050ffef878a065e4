import { describe, expect, it } from 'vitest';
import { DEFAULT_USER_AGENT, loadConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      connectTimeoutMs: 3050,
      readTimeoutMs: 18000,
      retryCount: 2,
      retryBackoffFactor: 0.5,
      maxRetryAfterMs: 10000,
      maxResponseBytes: 20 * 1024 * 1024,
      maxUrlLength: 400,
      cacheTtlSeconds: 1800,
      cacheCapacity: 64,
      userAgent: DEFAULT_USER_AGENT
    });
  });

  it('coerces numeric overrides', () => {
    const config = loadConfig({ OGC_RETRY_COUNT: '0', OGC_CACHE_TTL_SECONDS: '60', USER_AGENT: 'test-agent/1.0' });
    expect(config.retryCount).toBe(0);
    expect(config.cacheTtlSeconds).toBe(60);
    expect(config.userAgent).toBe('test-agent/1.0');
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ OGC_READ_TIMEOUT_MS: '  ', USER_AGENT: '' }).readTimeoutMs).toBe(18000);
  });

  it('reports invalid values as ConfigError', () => {
    const failure = (() => {
      try {
        loadConfig({ OGC_RETRY_COUNT: 'abc' });
        return undefined;
      } catch (error) {
        return error;
      }
    })();

    expect(failure).toBeInstanceOf(ConfigError);
    if (!(failure instanceof ConfigError)) return;
    expect(failure.code).toBe('CONFIG');
    expect(failure.issues).toHaveLength(1);
    expect(failure.issues[0]).toMatch(/^OGC_RETRY_COUNT: /);
  });
});
