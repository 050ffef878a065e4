import { CapabilitiesCache } from './cache/capabilities.js';
import type { PipelineConfig } from './config.js';
import { UnknownServiceError } from './errors.js';
import { createHttpTransport, type ByteTransport } from './http.js';
import { moduleLogger } from './logger.js';
import { VersionNegotiator } from './ogc/negotiate.js';
import { countItems, sortItems } from './ogc/normalize.js';
import type { ServiceRegistry } from './registry.js';
import type {
  CatalogItem,
  ReadonlyCatalogItem,
  RegisteredService,
  ServiceKind,
  ServiceResult
} from './types.js';

const log = moduleLogger('pipeline');

// Results are shared through the cache and stay frozen all the way down
function freezeItem(item: CatalogItem): ReadonlyCatalogItem {
  const { boundingBoxWgs84, ...rest } = item;
  return Object.freeze({
    ...rest,
    crs: Object.freeze([...item.crs]),
    styles: Object.freeze(item.styles.map(style => Object.freeze({ ...style }))),
    ...(boundingBoxWgs84 ? { boundingBoxWgs84: Object.freeze({ ...boundingBoxWgs84 }) } : {})
  });
}

export interface CapabilitiesServiceOptions {
  registry: ServiceRegistry;
  config: PipelineConfig;
  /** Defaults to an undici-backed transport built from `config`. */
  transport?: ByteTransport;
  /** Milliseconds since the epoch; drives both cache buckets and `fetchedAt`. */
  now?: () => number;
}

/**
 * Entry point for consumers: resolve a registered service, then serve its
 * normalized capabilities from the cache or the network.
 */
export class CapabilitiesService {
  private readonly registry: ServiceRegistry;
  private readonly negotiator: VersionNegotiator;
  private readonly cache: CapabilitiesCache;
  private readonly now: () => number;

  constructor(options: CapabilitiesServiceOptions) {
    this.registry = options.registry;
    this.now = options.now ?? Date.now;
    this.negotiator = new VersionNegotiator(
      options.transport ?? createHttpTransport(options.config),
      { maxUrlLength: options.config.maxUrlLength }
    );
    this.cache = new CapabilitiesCache({
      ttlSeconds: options.config.cacheTtlSeconds,
      capacity: options.config.cacheCapacity,
      now: this.now,
      load: serviceKey => this.load(serviceKey)
    });
  }

  async fetch(serviceKey: string, bypassCache = false): Promise<ServiceResult> {
    if (!this.registry.get(serviceKey)) {
      throw new UnknownServiceError(serviceKey);
    }
    return this.cache.get(serviceKey, bypassCache);
  }

  listServices(kind?: ServiceKind): RegisteredService[] {
    return this.registry.list(kind);
  }

  cacheStats() {
    return this.cache.stats();
  }

  private async load(serviceKey: string): Promise<ServiceResult> {
    const service = this.registry.get(serviceKey);
    if (!service) {
      throw new UnknownServiceError(serviceKey);
    }

    try {
      const negotiated = await this.negotiator.negotiate(service);
      const { items, version, outputFormats } = negotiated.parsed;
      const result: ServiceResult = {
        service: Object.freeze({
          key: service.key,
          label: service.label,
          kind: service.kind,
          url: service.baseUrl,
          capabilitiesUrl: negotiated.capabilitiesUrl,
          version: version || negotiated.requestedVersion || null,
          ...(outputFormats ? { outputFormats: Object.freeze([...outputFormats]) } : {})
        }),
        counts: Object.freeze(countItems(service.kind, items)),
        items: Object.freeze(sortItems(items).map(freezeItem)),
        fetchedAt: new Date(this.now()).toISOString(),
        fetchDurationMs: negotiated.durationMs
      };
      log.info(
        { service: serviceKey, version: result.service.version, items: result.counts.items, ms: result.fetchDurationMs },
        'capabilities loaded'
      );
      return Object.freeze(result);
    } catch (error) {
      log.warn({ service: serviceKey, err: error instanceof Error ? error.message : String(error) }, 'capabilities load failed');
      throw error;
    }
  }
}

export function createCapabilitiesService(options: CapabilitiesServiceOptions): CapabilitiesService {
  return new CapabilitiesService(options);
}
