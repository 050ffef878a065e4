import type { CatalogItem, ParsedCapabilities } from '../types.js';
import {
  children,
  childText,
  cornerPairBox,
  documentVersion,
  findAll,
  nodeText,
  parseXmlDocument,
  posPairBox,
  splitQualifiedName,
  uniqueStrings,
  attr,
  firstChild,
  type XmlNode
} from './xml.js';

function coverageItem(
  name: string | undefined,
  fields: Pick<CatalogItem, 'title' | 'abstract' | 'boundingBoxWgs84' | 'crs'>
): CatalogItem | undefined {
  if (!name) return undefined;
  const item: CatalogItem = {
    type: 'wcs_coverage',
    name,
    ...splitQualifiedName(name),
    crs: fields.crs,
    styles: []
  };
  if (fields.title) item.title = fields.title;
  if (fields.abstract) item.abstract = fields.abstract;
  if (fields.boundingBoxWgs84) item.boundingBoxWgs84 = fields.boundingBoxWgs84;
  return item;
}

// WCS 1.1 / 2.x
function summaryItem(summary: XmlNode): CatalogItem | undefined {
  return coverageItem(childText(summary, 'CoverageId') ?? childText(summary, 'Identifier'), {
    title: childText(summary, 'Title'),
    abstract: childText(summary, 'Abstract'),
    boundingBoxWgs84: cornerPairBox(summary),
    crs: uniqueStrings(children(summary, 'SupportedCRS').map(node => nodeText(node) ?? ''))
  });
}

// WCS 1.0
function offeringItem(brief: XmlNode): CatalogItem | undefined {
  const envelope = firstChild(brief, 'lonLatEnvelope');
  const envelopeCrs = envelope ? attr(envelope, 'srsName') : undefined;
  return coverageItem(childText(brief, 'name'), {
    title: childText(brief, 'label'),
    abstract: childText(brief, 'description'),
    boundingBoxWgs84: posPairBox(brief, 'lonLatEnvelope'),
    crs: uniqueStrings([envelopeCrs ?? ''])
  });
}

export function parseWcsCapabilities(bytes: Uint8Array): ParsedCapabilities {
  const doc = parseXmlDocument(bytes);

  const items: CatalogItem[] = [];
  for (const summary of findAll(doc.root, 'CoverageSummary')) {
    const item = summaryItem(summary);
    if (item) items.push(item);
  }
  for (const brief of findAll(doc.root, 'CoverageOfferingBrief')) {
    const item = offeringItem(brief);
    if (item) items.push(item);
  }

  const outputFormats = uniqueStrings(
    [...findAll(doc.root, 'formatSupported'), ...findAll(doc.root, 'SupportedFormat')]
      .map(node => nodeText(node) ?? '')
  );

  return { items, version: documentVersion(doc), outputFormats };
}
