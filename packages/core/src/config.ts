import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULT_USER_AGENT = 'ogc-explorer/0.1 (OGC capabilities explorer)';

const envSchema = z.object({
  OGC_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(3050),
  OGC_READ_TIMEOUT_MS: z.coerce.number().int().positive().default(18000),
  OGC_RETRY_COUNT: z.coerce.number().int().min(0).max(10).default(2),
  OGC_RETRY_BACKOFF_FACTOR: z.coerce.number().min(0).max(60).default(0.5),
  OGC_MAX_RETRY_AFTER_MS: z.coerce.number().int().min(0).default(10000),
  OGC_MAX_RESPONSE_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),
  OGC_MAX_URL_LENGTH: z.coerce.number().int().positive().default(400),
  OGC_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(1800),
  OGC_CACHE_CAPACITY: z.coerce.number().int().positive().default(64),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT)
});

export interface TransportConfig {
  connectTimeoutMs: number;
  readTimeoutMs: number;
  retryCount: number;
  /** Seconds; the n-th retry waits `factor * 2^(n-1)` seconds. */
  retryBackoffFactor: number;
  maxRetryAfterMs: number;
  maxResponseBytes: number;
  userAgent: string;
}

export interface PipelineConfig extends TransportConfig {
  maxUrlLength: number;
  cacheTtlSeconds: number;
  cacheCapacity: number;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): PipelineConfig {
  // Blank variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    connectTimeoutMs: values.OGC_CONNECT_TIMEOUT_MS,
    readTimeoutMs: values.OGC_READ_TIMEOUT_MS,
    retryCount: values.OGC_RETRY_COUNT,
    retryBackoffFactor: values.OGC_RETRY_BACKOFF_FACTOR,
    maxRetryAfterMs: values.OGC_MAX_RETRY_AFTER_MS,
    maxResponseBytes: values.OGC_MAX_RESPONSE_BYTES,
    maxUrlLength: values.OGC_MAX_URL_LENGTH,
    cacheTtlSeconds: values.OGC_CACHE_TTL_SECONDS,
    cacheCapacity: values.OGC_CACHE_CAPACITY,
    userAgent: values.USER_AGENT
  };
}
