import { TextDecoder } from 'node:util';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { MalformedDocumentError, ServiceExceptionError } from '../errors.js';
import type { BoundingBoxWgs84 } from '../types.js';

/** An element as fast-xml-parser models it: children by local name, attributes under `@_`. */
export type XmlNode = { [key: string]: unknown };

export interface XmlDocument {
  rootName: string;
  root: XmlNode;
}

const TEXT_KEY = '#text';
const ATTR_PREFIX = '@_';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  textNodeName: TEXT_KEY,
  removeNSPrefix: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true
});

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asNode(value: unknown): XmlNode | undefined {
  if (isXmlNode(value)) return value;
  // Text-only and empty elements come back as plain strings
  if (typeof value === 'string') return { [TEXT_KEY]: value };
  return undefined;
}

function declaredEncoding(bytes: Uint8Array): string {
  const head = Buffer.from(bytes.subarray(0, 200)).toString('latin1');
  const match = head.match(/^\s*<\?xml[^>]*encoding=["']([A-Za-z0-9._-]+)["']/);
  return match ? match[1] : 'utf-8';
}

function byteOrderMark(bytes: Uint8Array): string | undefined {
  if (bytes[0] === 0xff && bytes[1] === 0xfe) return 'utf-16le';
  if (bytes[0] === 0xfe && bytes[1] === 0xff) return 'utf-16be';
  if (bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) return 'utf-8';
  return undefined;
}

/** A byte-order mark wins over the encoding named in the XML declaration. */
export function decodeXml(bytes: Uint8Array): string {
  const label = byteOrderMark(bytes) ?? declaredEncoding(bytes);
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(label);
  } catch {
    // Unknown label: fall back to the XML default
    decoder = new TextDecoder('utf-8');
  }
  return decoder.decode(bytes);
}

/**
 * Parse a capabilities payload. Not-well-formed input raises
 * `MalformedDocumentError`; an OGC exception report raises
 * `ServiceExceptionError`.
 */
export function parseXmlDocument(bytes: Uint8Array): XmlDocument {
  const text = decodeXml(bytes).replace(/^\uFEFF/, '');
  if (!text.trim()) {
    throw new MalformedDocumentError('Empty capabilities document');
  }

  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new MalformedDocumentError(`Malformed XML at line ${line}: ${msg}`);
  }

  let parsed: unknown;
  try {
    parsed = parser.parse(text);
  } catch (error) {
    throw new MalformedDocumentError(`Malformed XML: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!isXmlNode(parsed)) {
    throw new MalformedDocumentError('Document has no root element');
  }
  for (const [rootName, value] of Object.entries(parsed)) {
    const root = asNode(value);
    if (!root || rootName.startsWith('!')) continue;
    if (rootName === 'ServiceExceptionReport' || rootName === 'ExceptionReport') {
      throw exceptionReportError(root);
    }
    return { rootName, root };
  }
  throw new MalformedDocumentError('Document has no root element');
}

function exceptionReportError(report: XmlNode): ServiceExceptionError {
  const exception = findFirst(report, 'ServiceException') ?? findFirst(report, 'Exception');
  if (!exception) {
    return new ServiceExceptionError('Server returned an exception report');
  }
  const message = nodeText(exception) ?? childText(exception, 'ExceptionText') ?? 'no details';
  const code = attr(exception, 'code') ?? attr(exception, 'exceptionCode');
  return new ServiceExceptionError(
    `Server returned an exception${code ? ` (${code})` : ''}: ${message}`,
    code
  );
}

export function nodeText(node: XmlNode): string | undefined {
  const value = node[TEXT_KEY];
  const text = typeof value === 'string' ? value.trim() : '';
  return text || undefined;
}

export function attr(node: XmlNode, name: string): string | undefined {
  const value = node[ATTR_PREFIX + name];
  return typeof value === 'string' ? value : undefined;
}

/** Direct children with the given local name, in document order. */
export function children(node: XmlNode, name: string): XmlNode[] {
  const value = node[name];
  const list = Array.isArray(value) ? value : [value];
  const result: XmlNode[] = [];
  for (const entry of list) {
    const child = asNode(entry);
    if (child) result.push(child);
  }
  return result;
}

export function firstChild(node: XmlNode, name: string): XmlNode | undefined {
  return children(node, name)[0];
}

/** Trimmed text of the first child with the given name; empty text counts as absent. */
export function childText(node: XmlNode, name: string): string | undefined {
  const child = firstChild(node, name);
  return child ? nodeText(child) : undefined;
}

function* elementEntries(node: XmlNode): Generator<[string, XmlNode]> {
  for (const [key, value] of Object.entries(node)) {
    if (key === TEXT_KEY || key.startsWith(ATTR_PREFIX)) continue;
    for (const entry of Array.isArray(value) ? value : [value]) {
      const child = asNode(entry);
      if (child) yield [key, child];
    }
  }
}

/** Depth-first search below `node` (the node itself is not matched). */
export function findFirst(node: XmlNode, name: string): XmlNode | undefined {
  for (const [key, child] of elementEntries(node)) {
    if (key === name) return child;
    const nested = findFirst(child, name);
    if (nested) return nested;
  }
  return undefined;
}

export function findAll(node: XmlNode, name: string): XmlNode[] {
  const found: XmlNode[] = [];
  for (const [key, child] of elementEntries(node)) {
    if (key === name) found.push(child);
    found.push(...findAll(child, name));
  }
  return found;
}

export function childNames(node: XmlNode): string[] {
  return [...new Set([...elementEntries(node)].map(([key]) => key))];
}

export function splitQualifiedName(name: string): { prefix: string; localName: string } {
  const index = name.indexOf(':');
  return index === -1
    ? { prefix: '', localName: name }
    : { prefix: name.slice(0, index), localName: name.slice(index + 1) };
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseCorner(value: string | undefined): [number, number] | undefined {
  if (!value) return undefined;
  const parts = value.trim().split(/\s+/).map(Number);
  if (parts.length < 2 || !Number.isFinite(parts[0]) || !Number.isFinite(parts[1])) return undefined;
  return [parts[0], parts[1]];
}

export function makeBox(
  minx: number | undefined,
  miny: number | undefined,
  maxx: number | undefined,
  maxy: number | undefined
): BoundingBoxWgs84 | undefined {
  if (minx === undefined || miny === undefined || maxx === undefined || maxy === undefined) {
    return undefined;
  }
  return { minx, miny, maxx, maxy, crs: 'EPSG:4326' };
}

/** `<WGS84BoundingBox><LowerCorner>lon lat</LowerCorner><UpperCorner>lon lat</UpperCorner>` */
export function cornerPairBox(node: XmlNode, elementName = 'WGS84BoundingBox'): BoundingBoxWgs84 | undefined {
  const box = firstChild(node, elementName);
  if (!box) return undefined;
  const lower = parseCorner(childText(box, 'LowerCorner'));
  const upper = parseCorner(childText(box, 'UpperCorner'));
  if (!lower || !upper) return undefined;
  return makeBox(lower[0], lower[1], upper[0], upper[1]);
}

/** `<LatLonBoundingBox minx=".." miny=".." maxx=".." maxy=".."/>` */
export function attributeBox(node: XmlNode, elementName: string): BoundingBoxWgs84 | undefined {
  const box = firstChild(node, elementName);
  if (!box) return undefined;
  return makeBox(
    parseNumber(attr(box, 'minx')),
    parseNumber(attr(box, 'miny')),
    parseNumber(attr(box, 'maxx')),
    parseNumber(attr(box, 'maxy'))
  );
}

/** WMS 1.3.0 `<EX_GeographicBoundingBox>` with one element per bound. */
export function geographicBox(node: XmlNode): BoundingBoxWgs84 | undefined {
  const box = firstChild(node, 'EX_GeographicBoundingBox');
  if (!box) return undefined;
  return makeBox(
    parseNumber(childText(box, 'westBoundLongitude')),
    parseNumber(childText(box, 'southBoundLatitude')),
    parseNumber(childText(box, 'eastBoundLongitude')),
    parseNumber(childText(box, 'northBoundLatitude'))
  );
}

/** Two `<pos>` corners, as in a WCS 1.0 `lonLatEnvelope`. */
export function posPairBox(node: XmlNode, elementName: string): BoundingBoxWgs84 | undefined {
  const envelope = firstChild(node, elementName);
  if (!envelope) return undefined;
  const positions = children(envelope, 'pos').map(pos => parseCorner(nodeText(pos)));
  const lower = positions[0];
  const upper = positions[1];
  if (!lower || !upper) return undefined;
  return makeBox(lower[0], lower[1], upper[0], upper[1]);
}

export function documentVersion(doc: XmlDocument): string | undefined {
  return attr(doc.root, 'version') ?? attr(doc.root, 'Version');
}

/** Order-preserving de-duplication that also drops blanks. */
export function uniqueStrings(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed) seen.add(trimmed);
  }
  return [...seen];
}
