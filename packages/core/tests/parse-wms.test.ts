import { describe, expect, it } from 'vitest';
import { parseWmsCapabilities } from '../src/ogc/parse-wms.js';
import { MalformedDocumentError, ServiceExceptionError } from '../src/errors.js';
import { fixture, xmlBytes } from './helpers.js';

describe('parseWmsCapabilities (1.3.0)', () => {
  const parsed = parseWmsCapabilities(fixture('wms-130.xml'));
  const byName = new Map(parsed.items.map(item => [item.name, item]));

  it('reads the declared version', () => {
    expect(parsed.version).toBe('1.3.0');
  });

  it('walks the layer tree depth-first and skips nameless layers', () => {
    expect(parsed.items.map(item => item.name)).toEqual(['topp:states', 'roads', 'topp:rivers', 'Alpha']);
  });

  it('extracts the fields of a named layer', () => {
    expect(byName.get('topp:states')).toEqual({
      type: 'wms_layer',
      name: 'topp:states',
      prefix: 'topp',
      localName: 'states',
      title: 'States',
      abstract: 'State boundaries',
      queryable: '1',
      crs: ['EPSG:4326', 'EPSG:3857'],
      boundingBoxWgs84: { minx: 5.87, miny: 47.27, maxx: 15.04, maxy: 55.06, crs: 'EPSG:4326' },
      styles: [{ name: 'population', title: 'Population' }]
    });
  });

  it('inherits title and CRS from the nearest ancestor through a nameless group', () => {
    const roads = byName.get('roads');
    expect(roads?.title).toBe('Group');
    expect(roads?.crs).toEqual(['EPSG:4326', 'EPSG:3857']);
    expect(roads?.prefix).toBe('');
    expect(roads?.localName).toBe('roads');
    expect(roads?.queryable).toBeUndefined();
    expect(roads?.boundingBoxWgs84).toBeUndefined();
  });

  it('replaces rather than merges an inherited CRS list', () => {
    expect(byName.get('topp:rivers')?.crs).toEqual(['EPSG:25832']);
    expect(byName.get('topp:rivers')?.queryable).toBe('0');
  });

  it('keeps styles that have a name or a title', () => {
    expect(byName.get('Alpha')?.styles).toEqual([{ name: 'default', title: '' }]);
  });
});

describe('parseWmsCapabilities (1.1.1)', () => {
  it('reads SRS lists and the attribute bounding box', () => {
    const parsed = parseWmsCapabilities(fixture('wms-111.xml'));

    expect(parsed.version).toBe('1.1.1');
    expect(parsed.items).toEqual([
      {
        type: 'wms_layer',
        name: 'gewaesser',
        prefix: '',
        localName: 'gewaesser',
        title: 'Gewaesser',
        queryable: '1',
        crs: ['EPSG:4326', 'EPSG:31467'],
        boundingBoxWgs84: { minx: 6, miny: 47.5, maxx: 15, maxy: 55, crs: 'EPSG:4326' },
        styles: []
      }
    ]);
  });

  it('decodes the declared ISO-8859-1 encoding', () => {
    const doc = '<?xml version="1.0" encoding="ISO-8859-1"?>'
      + '<WMT_MS_Capabilities version="1.1.1"><Capability><Layer>'
      + '<Name>wasser</Name><Title>Gewässer</Title>'
      + '</Layer></Capability></WMT_MS_Capabilities>';
    const parsed = parseWmsCapabilities(Buffer.from(doc, 'latin1'));

    expect(parsed.items[0]?.title).toBe('Gewässer');
  });

  it('follows a UTF-16 byte-order mark in either byte order', () => {
    const doc = '\uFEFF<?xml version="1.0" encoding="UTF-16"?>'
      + '<WMS_Capabilities version="1.3.0"><Capability><Layer>'
      + '<Name>see</Name><Title>Gewässer</Title>'
      + '</Layer></Capability></WMS_Capabilities>';
    const littleEndian = Buffer.from(doc, 'utf16le');
    const bigEndian = Buffer.from(doc, 'utf16le').swap16();

    expect([littleEndian[0], littleEndian[1]]).toEqual([0xff, 0xfe]);
    expect([bigEndian[0], bigEndian[1]]).toEqual([0xfe, 0xff]);
    for (const bytes of [littleEndian, bigEndian]) {
      const parsed = parseWmsCapabilities(bytes);
      expect(parsed.version).toBe('1.3.0');
      expect(parsed.items.map(item => [item.name, item.title])).toEqual([['see', 'Gewässer']]);
    }
  });
});

describe('parseWmsCapabilities edge cases', () => {
  it('returns no items when the document has no layers', () => {
    const parsed = parseWmsCapabilities(xmlBytes('<WMS_Capabilities version="1.3.0"><Capability/></WMS_Capabilities>'));
    expect(parsed).toEqual({ items: [], version: '1.3.0' });
  });

  it('tolerates layers without title, CRS or bounding box', () => {
    const parsed = parseWmsCapabilities(
      xmlBytes('<WMS_Capabilities><Capability><Layer><Name>bare</Name></Layer></Capability></WMS_Capabilities>')
    );
    expect(parsed.version).toBeUndefined();
    expect(parsed.items).toEqual([
      { type: 'wms_layer', name: 'bare', prefix: '', localName: 'bare', crs: [], styles: [] }
    ]);
  });

  it('rejects malformed XML', () => {
    expect(() => parseWmsCapabilities(xmlBytes('<WMS_Capabilities><Capability></WMS_Capabilities>')))
      .toThrow(MalformedDocumentError);
    expect(() => parseWmsCapabilities(xmlBytes('   '))).toThrow('Empty capabilities document');
  });

  it('turns an exception report into a ServiceExceptionError', () => {
    expect(() => parseWmsCapabilities(fixture('exception.xml'))).toThrow(ServiceExceptionError);
    expect(() => parseWmsCapabilities(fixture('exception.xml')))
      .toThrow('Server returned an exception (InvalidParameterValue): Unsupported version');
  });
});
