import type { CatalogItem, ParsedCapabilities } from '../types.js';
import {
  attr,
  children,
  childNames,
  childText,
  cornerPairBox,
  documentVersion,
  findAll,
  findFirst,
  nodeText,
  parseXmlDocument,
  splitQualifiedName,
  uniqueStrings,
  type XmlNode
} from './xml.js';

function featureTypeItem(featureType: XmlNode): CatalogItem | undefined {
  const name = childText(featureType, 'Name');
  if (!name) return undefined;

  const defaultCrs = childText(featureType, 'DefaultCRS')
    ?? childText(featureType, 'DefaultSRS')
    ?? childText(featureType, 'SRS');
  const otherCrs = [...children(featureType, 'OtherCRS'), ...children(featureType, 'OtherSRS')]
    .map(node => nodeText(node) ?? '');

  const item: CatalogItem = {
    type: 'wfs_feature_type',
    name,
    ...splitQualifiedName(name),
    crs: uniqueStrings([defaultCrs ?? '', ...otherCrs]),
    styles: []
  };
  const title = childText(featureType, 'Title');
  if (title) item.title = title;
  const abstract = childText(featureType, 'Abstract');
  if (abstract) item.abstract = abstract;
  if (defaultCrs) item.defaultCrs = defaultCrs;
  const box = cornerPairBox(featureType);
  if (box) item.boundingBoxWgs84 = box;
  return item;
}

function sameName(node: XmlNode, name: string): boolean {
  return attr(node, 'name')?.toLowerCase() === name.toLowerCase();
}

/**
 * GetFeature output formats: OWS `OperationsMetadata` for WFS 1.1/2.0, the
 * `ResultFormat` element list for WFS 1.0.
 */
export function wfsOutputFormats(root: XmlNode): string[] {
  const metadata = findFirst(root, 'OperationsMetadata');
  if (metadata) {
    const getFeature = children(metadata, 'Operation').find(op => sameName(op, 'GetFeature'));
    const parameter = getFeature
      ? children(getFeature, 'Parameter').find(param => sameName(param, 'outputFormat'))
      : undefined;
    if (parameter) {
      return uniqueStrings(findAll(parameter, 'Value').map(value => nodeText(value) ?? ''));
    }
  }

  const request = findFirst(root, 'Request');
  const resultFormat = request ? findFirst(request, 'ResultFormat') : undefined;
  return resultFormat ? childNames(resultFormat) : [];
}

export function parseWfsCapabilities(bytes: Uint8Array): ParsedCapabilities {
  const doc = parseXmlDocument(bytes);
  const list = findFirst(doc.root, 'FeatureTypeList');
  const featureTypes = list ? children(list, 'FeatureType') : findAll(doc.root, 'FeatureType');

  const items: CatalogItem[] = [];
  for (const featureType of featureTypes) {
    const item = featureTypeItem(featureType);
    if (item) items.push(item);
  }

  return {
    items,
    version: documentVersion(doc),
    outputFormats: wfsOutputFormats(doc.root)
  };
}
