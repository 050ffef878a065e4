import type { CatalogItem, ParsedCapabilities, StyleRef } from '../types.js';
import {
  attr,
  attributeBox,
  children,
  childText,
  cornerPairBox,
  documentVersion,
  findFirst,
  geographicBox,
  nodeText,
  parseXmlDocument,
  splitQualifiedName,
  uniqueStrings,
  type XmlNode
} from './xml.js';

/** What a layer passes down to its children. */
interface LayerContext {
  title?: string;
  crs: string[];
}

function layerCrs(layer: XmlNode): string[] {
  // 1.3.0 uses CRS, 1.1.1 uses SRS; old servers pack several codes into one element
  const codes = [...children(layer, 'CRS'), ...children(layer, 'SRS')]
    .flatMap(node => (nodeText(node) ?? '').split(/\s+/));
  return uniqueStrings(codes);
}

function layerStyles(layer: XmlNode): StyleRef[] {
  const styles: StyleRef[] = [];
  for (const style of children(layer, 'Style')) {
    const name = childText(style, 'Name') ?? '';
    const title = childText(style, 'Title') ?? '';
    if (name || title) {
      styles.push({ name, title });
    }
  }
  return styles;
}

function walk(layer: XmlNode, inherited: LayerContext, items: CatalogItem[]): void {
  const name = childText(layer, 'Name');
  const ownCrs = layerCrs(layer);
  const context: LayerContext = {
    title: childText(layer, 'Title') ?? inherited.title,
    crs: ownCrs.length ? ownCrs : inherited.crs
  };

  if (name) {
    const item: CatalogItem = {
      type: 'wms_layer',
      name,
      ...splitQualifiedName(name),
      crs: [...context.crs],
      styles: layerStyles(layer)
    };
    if (context.title) item.title = context.title;
    const abstract = childText(layer, 'Abstract');
    if (abstract) item.abstract = abstract;
    const queryable = attr(layer, 'queryable');
    if (queryable !== undefined) item.queryable = queryable;
    const box = geographicBox(layer)
      ?? cornerPairBox(layer)
      ?? attributeBox(layer, 'LatLonBoundingBox');
    if (box) item.boundingBoxWgs84 = box;
    items.push(item);
  }

  for (const child of children(layer, 'Layer')) {
    walk(child, context, items);
  }
}

export function parseWmsCapabilities(bytes: Uint8Array): ParsedCapabilities {
  const doc = parseXmlDocument(bytes);
  const capability = findFirst(doc.root, 'Capability') ?? doc.root;
  const topLayer = findFirst(capability, 'Layer');

  const items: CatalogItem[] = [];
  if (topLayer) {
    walk(topLayer, { crs: [] }, items);
  }

  return { items, version: documentVersion(doc) };
}
