import type { CatalogItem, ServiceKind } from '../types.js';

// Code-unit comparison: case-sensitive and locale independent
function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareItems(a: CatalogItem, b: CatalogItem): number {
  return compareStrings(a.prefix, b.prefix)
    || compareStrings(a.localName, b.localName)
    || compareStrings(a.name, b.name);
}

export function sortItems(items: readonly CatalogItem[]): CatalogItem[] {
  return [...items].sort(compareItems);
}

export function countItems(kind: ServiceKind, items: readonly CatalogItem[]): { items: number; styles?: number } {
  if (kind !== 'WMS') {
    return { items: items.length };
  }
  return {
    items: items.length,
    styles: items.reduce((sum, item) => sum + item.styles.length, 0)
  };
}
