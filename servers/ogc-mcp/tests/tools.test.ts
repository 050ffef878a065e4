import { describe, expect, it } from 'vitest';
import { fileURLToPath } from 'url';
import {
  CapabilitiesService,
  InMemoryServiceRegistry,
  loadServiceRegistryYaml,
  type ByteTransport,
  type PipelineConfig
} from '@ogc-explorer/core';
import { getCapabilities, getCapabilitiesSchema } from '../src/tools/get_capabilities.js';
import { listServices } from '../src/tools/list_services.js';

const config: PipelineConfig = {
  connectTimeoutMs: 1000,
  readTimeoutMs: 1000,
  retryCount: 0,
  retryBackoffFactor: 0,
  maxRetryAfterMs: 0,
  maxResponseBytes: 1024 * 1024,
  maxUrlLength: 400,
  cacheTtlSeconds: 60,
  cacheCapacity: 8,
  userAgent: 'test-agent/1.0'
};

const WFS_DOCUMENT = '<WFS_Capabilities version="2.0.0"><FeatureTypeList>'
  + '<FeatureType><Name>demo:points</Name><Title>Points</Title></FeatureType>'
  + '</FeatureTypeList></WFS_Capabilities>';

const transport: ByteTransport = {
  getBytes: async () => Buffer.from(WFS_DOCUMENT, 'utf-8')
};

const registry = new InMemoryServiceRegistry([
  { key: 'demo_wfs', kind: 'WFS', baseUrl: 'https://example.org/wfs', label: 'Demo WFS', group: 'Demo' },
  { key: 'demo_wms', kind: 'WMS', baseUrl: 'https://example.org/wms', label: 'Demo WMS', group: 'Demo' }
]);

const service = new CapabilitiesService({ registry, config, transport, now: () => 0 });

describe('ogc_get_capabilities', () => {
  it('returns the normalized result as JSON', async () => {
    const response = await getCapabilities({ service: 'demo_wfs' }, service);

    expect('isError' in response).toBe(false);
    const body = JSON.parse(response.content[0]?.text ?? '{}');
    expect(body.service.version).toBe('2.0.0');
    expect(body.items).toEqual([
      { type: 'wfs_feature_type', name: 'demo:points', prefix: 'demo', localName: 'points', title: 'Points', crs: [], styles: [] }
    ]);
    expect(body.fetchedAt).toBe('1970-01-01T00:00:00.000Z');
  });

  it('reports pipeline errors as tool errors', async () => {
    const response = await getCapabilities({ service: 'nope' }, service);

    expect(response).toEqual({
      isError: true,
      content: [{ type: 'text', text: 'UNKNOWN_SERVICE: Unknown service: nope' }]
    });
  });

  it('validates its arguments', () => {
    expect(getCapabilitiesSchema.safeParse({ service: '' }).success).toBe(false);
    expect(getCapabilitiesSchema.parse({ service: 'demo_wfs', refresh: true })).toEqual({ service: 'demo_wfs', refresh: true });
  });
});

describe('ogc_list_services', () => {
  it('filters by kind', async () => {
    const response = await listServices({ kind: 'WMS' }, service);

    expect(JSON.parse(response.content[0]?.text ?? '{}')).toEqual({
      count: 1,
      services: [{ key: 'demo_wms', label: 'Demo WMS', kind: 'WMS', group: 'Demo', url: 'https://example.org/wms' }]
    });
  });
});

describe('bundled services.yaml', () => {
  it('contains only valid entries', () => {
    const bundled = loadServiceRegistryYaml(fileURLToPath(new URL('../services.yaml', import.meta.url)));
    expect(bundled.list()).toHaveLength(22);
    expect(bundled.list('WCS')).toHaveLength(2);
  });
});
