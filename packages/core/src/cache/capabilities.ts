import { moduleLogger } from '../logger.js';
import type { ServiceResult } from '../types.js';
import { MemoryCache } from './memory.js';

const log = moduleLogger('cache');

export type ResultLoader = (serviceKey: string) => Promise<ServiceResult>;

export interface CapabilitiesCacheOptions {
  ttlSeconds: number;
  capacity: number;
  load: ResultLoader;
  /** Milliseconds since the epoch. */
  now?: () => number;
}

export interface CapabilitiesCacheStats {
  entries: number;
  inFlight: number;
  hits: number;
  misses: number;
}

/**
 * Time-bucketed memoization in front of the capabilities loader.
 *
 * A result is stored under `(serviceKey, floor(now / ttl))`, so everything
 * stored in one window expires together when the clock crosses into the next
 * bucket. Only successful loads are stored. Concurrent misses for the same
 * key and bucket share a single in-flight load.
 */
export class CapabilitiesCache {
  private readonly entries: MemoryCache<ServiceResult>;
  private readonly inFlight = new Map<string, Promise<ServiceResult>>();
  private readonly ttlMs: number;
  private readonly load: ResultLoader;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(options: CapabilitiesCacheOptions) {
    if (!(options.ttlSeconds > 0)) {
      throw new RangeError(`Cache TTL must be positive, got ${options.ttlSeconds}`);
    }
    this.entries = new MemoryCache<ServiceResult>(options.capacity);
    this.ttlMs = options.ttlSeconds * 1000;
    this.load = options.load;
    this.now = options.now ?? Date.now;
  }

  bucket(): number {
    return Math.floor(this.now() / this.ttlMs);
  }

  async get(serviceKey: string, bypass: boolean): Promise<ServiceResult> {
    if (bypass) {
      log.debug({ service: serviceKey }, 'cache bypassed');
      return this.load(serviceKey);
    }

    const bucket = this.bucket();
    const key = `${serviceKey}@${bucket}`;

    const cached = this.entries.get(key);
    if (cached) {
      this.hits++;
      return cached;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      log.debug({ service: serviceKey, bucket }, 'joining in-flight load');
      return pending;
    }

    this.misses++;
    this.entries.cleanup(bucket);

    const loading = this.load(serviceKey)
      .then(result => {
        this.entries.set(key, result, bucket);
        return result;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, loading);
    return loading;
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): CapabilitiesCacheStats {
    return {
      entries: this.entries.size,
      inFlight: this.inFlight.size,
      hits: this.hits,
      misses: this.misses
    };
  }
}
