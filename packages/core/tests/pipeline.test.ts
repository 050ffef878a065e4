import { describe, expect, it } from 'vitest';
import { CapabilitiesService } from '../src/pipeline.js';
import { InMemoryServiceRegistry } from '../src/registry.js';
import { CapabilitiesUnavailableError, HttpStatusError, UnknownServiceError } from '../src/errors.js';
import { FakeTransport, fixture, testConfig } from './helpers.js';

const NOW = 1_700_000_000_000;

const registry = new InMemoryServiceRegistry([
  { key: 'test_wms', kind: 'WMS', baseUrl: 'https://example.org/wms?SERVICE=WMS', label: 'Test WMS' },
  { key: 'test_wfs', kind: 'WFS', baseUrl: 'https://example.org/wfs', label: 'Test WFS', group: 'Vectors' }
]);

function serviceWith(transport: FakeTransport): CapabilitiesService {
  return new CapabilitiesService({ registry, config: testConfig(), transport, now: () => NOW });
}

function byKind(url: string): Uint8Array {
  return url.includes('/wfs') ? fixture('wfs-200.xml') : fixture('wms-130.xml');
}

describe('CapabilitiesService', () => {
  it('rejects unknown keys before any request', async () => {
    const transport = new FakeTransport(byKind);

    await expect(serviceWith(transport).fetch('nope')).rejects.toThrow(UnknownServiceError);
    expect(transport.calls).toEqual([]);
  });

  it('returns sorted items with service metadata', async () => {
    const result = await serviceWith(new FakeTransport(byKind)).fetch('test_wms');

    expect(result.service).toEqual({
      key: 'test_wms',
      label: 'Test WMS',
      kind: 'WMS',
      url: 'https://example.org/wms?SERVICE=WMS',
      capabilitiesUrl: 'https://example.org/wms?request=GetCapabilities&service=WMS&version=1.3.0',
      version: '1.3.0'
    });
    expect(result.items.map(item => item.name)).toEqual(['Alpha', 'roads', 'topp:rivers', 'topp:states']);
    expect(result.counts.items).toBe(4);
    expect(result.fetchedAt).toBe('2023-11-14T22:13:20.000Z');
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('serves the same result again within the TTL', async () => {
    const transport = new FakeTransport(byKind);
    const service = serviceWith(transport);

    const first = await service.fetch('test_wms');
    const second = await service.fetch('test_wms');

    expect(second).toBe(first);
    expect(transport.calls).toHaveLength(1);
    expect(service.cacheStats()).toEqual({ entries: 1, inFlight: 0, hits: 1, misses: 1 });
  });

  it('hands out results that callers cannot change', async () => {
    const service = serviceWith(new FakeTransport(byKind));
    const first = await service.fetch('test_wms');
    const states = first.items.find(item => item.name === 'topp:states');

    expect(states).toBeDefined();
    if (!states) return;
    expect([first.service, first.counts, first.items, states, states.crs, states.styles, states.styles[0], states.boundingBoxWgs84]
      .every(part => Object.isFrozen(part))).toBe(true);
    expect(Reflect.set(states, 'name', 'changed')).toBe(false);
    expect(() => Reflect.apply(Array.prototype.push, states.crs, ['EPSG:9999'])).toThrow(TypeError);

    const second = await service.fetch('test_wms');
    const again = second.items.find(item => item.name === 'topp:states');
    expect(again?.crs).toEqual(['EPSG:4326', 'EPSG:3857']);
  });

  it('goes to the network when the cache is bypassed', async () => {
    const transport = new FakeTransport(byKind);
    const service = serviceWith(transport);

    await service.fetch('test_wms');
    await service.fetch('test_wms', true);
    expect(transport.calls).toHaveLength(2);
  });

  it('reports the version that actually answered', async () => {
    const transport = new FakeTransport(url =>
      url.includes('version=1.3.0') ? new HttpStatusError(url, 400, 'Bad Request') : fixture('wms-111.xml')
    );
    const result = await serviceWith(transport).fetch('test_wms');

    expect(result.service.version).toBe('1.1.1');
    expect(result.service.capabilitiesUrl).toBe('https://example.org/wms?request=GetCapabilities&service=WMS&version=1.1.1');
    expect(transport.calls).toHaveLength(2);
  });

  it('does not cache a failed load', async () => {
    const transport = new FakeTransport(url => new HttpStatusError(url, 503, 'Service Unavailable'));
    const service = serviceWith(transport);

    await expect(service.fetch('test_wfs')).rejects.toThrow(CapabilitiesUnavailableError);
    expect(transport.calls).toHaveLength(4);

    transport.respond = byKind;
    const result = await service.fetch('test_wfs');
    expect(result.counts).toEqual({ items: 2 });
  });

  it('carries WFS output formats and bounding boxes', async () => {
    const result = await serviceWith(new FakeTransport(byKind)).fetch('test_wfs');

    expect(result.service.outputFormats).toEqual(['application/gml+xml; version=3.2', 'application/json', 'text/csv']);
    expect(result.items.map(item => item.name)).toEqual(['vg250:bundeslaender', 'vg250:gemeinden']);
    expect(result.items[1]?.boundingBoxWgs84).toEqual({ minx: 5.5, miny: 47, maxx: 15.5, maxy: 55, crs: 'EPSG:4326' });
  });

  it('lists registered services', () => {
    const service = serviceWith(new FakeTransport(byKind));
    expect(service.listServices().map(entry => entry.key)).toEqual(['test_wms', 'test_wfs']);
    expect(service.listServices('WFS').map(entry => entry.key)).toEqual(['test_wfs']);
  });
});
