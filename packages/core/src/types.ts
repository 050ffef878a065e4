export type ServiceKind = 'WMS' | 'WFS' | 'WCS';

export const SERVICE_KINDS: readonly ServiceKind[] = ['WMS', 'WFS', 'WCS'];

export type CatalogItemType = 'wms_layer' | 'wfs_feature_type' | 'wcs_coverage';

export interface ServiceDescriptor {
  readonly key: string;
  readonly kind: ServiceKind;
  /** https only, length-bounded */
  readonly baseUrl: string;
}

export interface RegisteredService extends ServiceDescriptor {
  readonly label: string;
  readonly group?: string;
}

export interface BoundingBoxWgs84 {
  minx: number;
  miny: number;
  maxx: number;
  maxy: number;
  crs: 'EPSG:4326';
}

export interface StyleRef {
  name: string;
  title: string;
}

export interface CatalogItem {
  type: CatalogItemType;
  name: string;
  prefix: string;
  localName: string;
  title?: string;
  abstract?: string;
  queryable?: string;
  crs: string[];
  defaultCrs?: string;
  boundingBoxWgs84?: BoundingBoxWgs84;
  styles: StyleRef[];
}

/** A catalog item as served from the cache: frozen all the way down. */
export interface ReadonlyCatalogItem
  extends Readonly<Omit<CatalogItem, 'crs' | 'styles' | 'boundingBoxWgs84'>> {
  readonly crs: readonly string[];
  readonly boundingBoxWgs84?: Readonly<BoundingBoxWgs84>;
  readonly styles: readonly Readonly<StyleRef>[];
}

/** What a dialect parser hands back for one capabilities document. */
export interface ParsedCapabilities {
  items: CatalogItem[];
  version?: string;
  outputFormats?: string[];
}

export interface ServiceResult {
  readonly service: {
    readonly key: string;
    readonly label: string;
    readonly kind: ServiceKind;
    readonly url: string;
    readonly capabilitiesUrl: string;
    readonly version: string | null;
    readonly outputFormats?: readonly string[];
  };
  readonly counts: {
    readonly items: number;
    readonly styles?: number;
  };
  readonly items: readonly ReadonlyCatalogItem[];
  readonly fetchedAt: string;
  readonly fetchDurationMs: number;
}

export interface CacheEntry<T> {
  key: string;
  value: T;
  bucket: number;
  createdAt: number;
}
