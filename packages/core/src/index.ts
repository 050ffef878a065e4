export * from './types.js';
export * from './errors.js';
export * from './config.js';
export { logger, moduleLogger, type Logger } from './logger.js';
export {
  HttpTransport,
  createHttpTransport,
  getWithRetry,
  classifyFetchFailure,
  isRetryable,
  parseRetryAfterHeader,
  CAPABILITIES_ACCEPT,
  type ByteTransport,
  type HttpTransportOptions,
  type RetryOptions
} from './http.js';
export { startServer, type ServerTransportConfig } from './transport.js';
export { MemoryCache } from './cache/memory.js';
export { CapabilitiesCache, type CapabilitiesCacheOptions, type CapabilitiesCacheStats } from './cache/capabilities.js';
export { buildEndpointUrl, capabilitiesOverrides, DEFAULT_MAX_URL_LENGTH } from './ogc/endpoint.js';
export {
  VersionNegotiator,
  VERSION_CANDIDATES,
  DIALECT_PARSERS,
  type AttemptOutcome,
  type NegotiatedCapabilities,
  type DialectParser
} from './ogc/negotiate.js';
export { parseWmsCapabilities } from './ogc/parse-wms.js';
export { parseWfsCapabilities, wfsOutputFormats } from './ogc/parse-wfs.js';
export { parseWcsCapabilities } from './ogc/parse-wcs.js';
export { sortItems, compareItems, countItems } from './ogc/normalize.js';
export {
  InMemoryServiceRegistry,
  loadServiceRegistryYaml,
  registryFromData,
  type ServiceRegistry
} from './registry.js';
export {
  CapabilitiesService,
  createCapabilitiesService,
  type CapabilitiesServiceOptions
} from './pipeline.js';
