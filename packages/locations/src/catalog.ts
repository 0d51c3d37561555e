import { InvalidReferenceDataError, UnknownLocationError } from "./errors.js";

export type WarehouseClassification = "INDOOR" | "OUTDOOR" | "DANGEROUS";
export type LocationKind = "WAREHOUSE" | "SITE";

export type WarehouseRef = {
  id: string;
  classification: WarehouseClassification;
};

export type SiteRef = {
  id: string;
  group: string;
};

export type LocationReference = {
  warehouses: WarehouseRef[];
  sites: SiteRef[];
};

export type LocationColumn = {
  location_id: string;
  kind: LocationKind;
  rank: number;
};

/**
 * Read-only lookup over the configured warehouses and sites.
 *
 * Column rank follows declaration order: warehouses first, then sites. The rank
 * breaks ties between same-day arrivals and orders report rows.
 */
export type LocationCatalog = {
  readonly columns: readonly LocationColumn[];
  readonly warehouseIds: readonly string[];
  readonly siteIds: readonly string[];

  has(location_id: string): boolean;
  kindOf(location_id: string): LocationKind;
  rankOf(location_id: string): number;
  classification(warehouse_id: string): WarehouseClassification;
  siteGroup(site_id: string): string;
};

export function createLocationCatalog(ref: LocationReference): LocationCatalog {
  const columns: LocationColumn[] = [];
  const byId = new Map<string, LocationColumn>();
  const classes = new Map<string, WarehouseClassification>();
  const groups = new Map<string, string>();

  function add(location_id: string, kind: LocationKind) {
    if (byId.has(location_id)) {
      throw new InvalidReferenceDataError(`location '${location_id}' is declared more than once`);
    }
    const col = { location_id, kind, rank: columns.length };
    columns.push(col);
    byId.set(location_id, col);
  }

  for (const w of ref.warehouses) {
    add(w.id, "WAREHOUSE");
    classes.set(w.id, w.classification);
  }
  for (const s of ref.sites) {
    add(s.id, "SITE");
    groups.set(s.id, s.group);
  }

  function column(location_id: string): LocationColumn {
    const col = byId.get(location_id);
    if (!col) throw new UnknownLocationError(location_id);
    return col;
  }

  return Object.freeze({
    columns: Object.freeze(columns.map((c) => Object.freeze(c))),
    warehouseIds: Object.freeze(ref.warehouses.map((w) => w.id)),
    siteIds: Object.freeze(ref.sites.map((s) => s.id)),

    has: (location_id: string) => byId.has(location_id),
    kindOf: (location_id: string) => column(location_id).kind,
    rankOf: (location_id: string) => column(location_id).rank,

    classification(warehouse_id: string): WarehouseClassification {
      const c = classes.get(warehouse_id);
      if (c == null) throw new UnknownLocationError(warehouse_id, "WAREHOUSE");
      return c;
    },

    siteGroup(site_id: string): string {
      const g = groups.get(site_id);
      if (g == null) throw new UnknownLocationError(site_id, "SITE");
      return g;
    },
  });
}
